/**
 * CLI module, a thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerRunCommand, registerListCommand, registerSelectorCommand } from './run.js';
export {
  registerIdentityCommand,
  registerDelayCommand,
  registerProxyCommand,
} from './admin.js';
