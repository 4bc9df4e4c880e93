export { lists } from './lists.js';
export { tasks } from './tasks.js';
export { config } from './config.js';
