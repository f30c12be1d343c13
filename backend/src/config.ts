/**
 * Config — Runtime settings read once from the environment
 */
import { resolve } from 'path';

export interface AppConfig {
  port: number;
  dataDir: string;
  dataFile: string;
  seedSampleData: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = Number(env.PORT);
  return {
    port: Number.isInteger(port) && port > 0 ? port : 3001,
    dataDir: resolve(env.DATA_DIR || 'data'),
    dataFile: env.DATA_FILE || 'gradebook_data.json',
    seedSampleData: env.SEED_SAMPLE_DATA !== 'false',
  };
}

export const config = loadConfig();
