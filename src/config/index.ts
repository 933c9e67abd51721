import { config } from 'dotenv';
import { loadAppConfig } from './schema';

// Load environment variables
config();

export const appConfig = loadAppConfig();
