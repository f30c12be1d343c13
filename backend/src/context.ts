import type { Gradebook } from './models/gradebook.js';
import type { AuthService } from './services/auth.js';
import type { DataStore } from './services/dataStore.js';

/** Shared state handed to every route module; one gradebook per process. */
export interface AppContext {
  gradebook: Gradebook;
  dataStore: DataStore;
  auth: AuthService;
}
