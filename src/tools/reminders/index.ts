/**
 * Reminder Tools Module
 *
 * Exports reminder tool handlers for reuse between the stdio and HTTP
 * transports.
 */

export {
  handleRemindersList,
  handleReminderAdd,
  handleReminderEdit,
  handleReminderComplete,
  handleReminderDelete,
} from './handlers.js';
