// Default paths and constants
export const DEFAULT_STORE_FILE_PATH = 'planner_store.json';

export const APP_VERSION = '1.0.0';

// HTTP boundary
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_PORT = 5000;

// Number of user/assistant exchanges replayed into each model request
export const DEFAULT_MEMORY_WINDOW = 10;

// Upper bound on conversations kept in memory before least-recently-used ones are dropped
export const DEFAULT_MAX_CONVERSATIONS = 100;
