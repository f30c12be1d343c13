/**
 * Server Entry Point — Loads the gradebook and starts the HTTP server
 *
 * Restores the saved snapshot from the data directory, falling back to the
 * sample gradebook (or an empty one when seeding is off), then serves the
 * API on the configured port.
 */
import { createApp } from './app.js';
import { config } from './config.js';
import { Gradebook } from './models/gradebook.js';
import { AuthService } from './services/auth.js';
import { DataStore } from './services/dataStore.js';
import { createSampleGradebook } from './services/sampleData.js';

const dataStore = new DataStore(config.dataDir, config.dataFile);

const { gradebook: saved, message } = dataStore.loadGradebook();
let gradebook: Gradebook;
if (saved) {
  gradebook = saved;
  console.log(`[SERVER] Loaded existing data: ${message}`);
} else if (config.seedSampleData) {
  gradebook = createSampleGradebook();
  console.log(`[SERVER] ${message} - created new gradebook with sample data`);
} else {
  gradebook = new Gradebook();
  console.log(`[SERVER] ${message} - starting with an empty gradebook`);
}

const app = createApp({ gradebook, dataStore, auth: new AuthService() });

// Start server
app.listen(config.port, () => {
  console.log(`
  ╔═══════════════════════════════════════════╗
  ║          Gradebook Backend Server         ║
  ╠═══════════════════════════════════════════╣
  ║  Local:   http://localhost:${config.port}           ║
  ║  Health:  http://localhost:${config.port}/api/health║
  ║  Data:    ${config.dataFile.padEnd(32)}║
  ╚═══════════════════════════════════════════╝
  `);
  console.log(`[SERVER] ${gradebook.studentCount} students, ${gradebook.teacherCount} teachers`);
  console.log('[SERVER] Ready to accept requests');
});
