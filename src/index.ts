import dotenv from 'dotenv';
import mongoose from 'mongoose';
import { createApp } from './app';
import { loadSettings, Settings } from './config/settings';
import { buildServices } from './services';
import { errorMessage } from './utils/errors';
import { logError, logInfo } from './utils/logger';

dotenv.config();

// Validate environment variables
let settings: Settings;
try {
  settings = loadSettings(process.env);
} catch (err) {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
}

// Connect to MongoDB when result persistence is configured
if (settings.mongodbUri) {
  mongoose
    .connect(settings.mongodbUri)
    .then(() => logInfo('Server', 'Connected to MongoDB'))
    .catch(err => {
      logError('MongoDB connection error', err);
      process.exit(1);
    });
}

const app = createApp(buildServices(settings), { corsOrigins: settings.corsOrigins });

// Start server
app.listen(settings.port, '0.0.0.0', () => {
  logInfo('Server', `Server running on port ${settings.port}`);
});
