/**
 * List Tools Module
 */

export {
  handleListsList,
  handleListCreate,
  handleListRename,
  handleListDelete,
} from './handlers.js';
