export { serveCommand } from './serve.js';
export { runCommand, type RunOptions } from './run.js';
export { checkEnvCommand } from './checkEnv.js';
