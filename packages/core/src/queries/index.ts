export { loadTasks, saveTasks } from './task-store.js';
export {
  getConfig, setConfig, getAssistantName, setAssistantName, DEFAULT_ASSISTANT_NAME,
} from './config-queries.js';
