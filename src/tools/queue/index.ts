/**
 * Pending Action Tools Module
 */

export {
  handleProcessPendingActions,
  handlePendingActionsList,
  handlePendingActionsReplay,
  handlePendingActionRemove,
} from './handlers.js';
