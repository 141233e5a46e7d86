export { tasks, NOW } from './tasks.js';
