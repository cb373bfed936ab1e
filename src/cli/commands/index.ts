/**
 * CLI Commands index
 * Re-exports all command registration functions
 */

export { registerDossierCommands } from './dossier.js';
