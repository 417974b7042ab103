export { registerListCommand } from './list';
export { registerIngestCommand } from './ingest';
export { registerAskCommand } from './ask';
export { registerStatusCommand } from './status';
export { registerRemoveCommand } from './remove';
