/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

export {
  performCreate,
  CreateResultView,
  CreateCommand,
  runCreate,
  type CreateCommandOptions,
} from './create.js';

export { ShowResultView, ShowCommand, runShow, type ShowCommandOptions } from './show.js';

export {
  ExistsResultView,
  ExistsCommand,
  runExists,
  type ExistsCommandOptions,
} from './exists.js';

export { RemoveCommand, runRemove, type RemoveCommandOptions } from './remove.js';

export {
  WhitelistView,
  GateCommand,
  runGate,
  CheckResultView,
  CheckCommand,
  runCheck,
  type GateCommandOptions,
  type CheckCommandOptions,
} from './gate.js';
