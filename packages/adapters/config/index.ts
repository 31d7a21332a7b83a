export { loadWizardEnv, WizardEnvSchema, type WizardEnv, type WizardHostConfig } from './env.js';
