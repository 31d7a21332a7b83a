/**
 * Core Ports
 *
 * Exports all port interfaces (contracts) of the wizard.
 * Ports define the boundaries between the wizard core and its collaborators:
 * forms, state storage, file storage, and the host's request/response layer.
 */

// Form Construction
export * from './form.js';

// Wizard State Storage
export * from './wizard-storage.js';

// File Storage
export * from './file-storage.js';

// Requests & Responses
export * from './responses.js';
