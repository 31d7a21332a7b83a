/**
 * Core Domain
 *
 * Step model, step navigation and errors of the multi-form wizard.
 * Domain types are independent of storage, forms and transport.
 */

// Wizard Domain Types
export * from './wizard.js';

// Errors
export * from './errors.js';

// Step Collection Builder
export * from './step-collection.js';

// Conditions & Navigation
export * from './steps.js';
