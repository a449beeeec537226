export * from './enums.js';
export * from './entities.js';
export * from './action-definition.js';
export * from './intents.js';
export * from './selection-state.js';
export * from './flow-events.js';
export * from './collaborators.js';
export * from './input-events.js';
