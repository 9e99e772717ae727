/**
 * Format module.
 */

export * from './TextPresenter.js';
