import { Server } from 'http';
import { loadConfigFromEnvFile } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { MongoTriviaRepository } from './repositories/triviaRepository';
import { createApp } from './app';

const config = loadConfigFromEnvFile();
let server: Server | null = null;

const startServer = async () => {
  try {
    await connectDatabase(config.mongoUri);
    console.log('✓ MongoDB connected');

    const app = createApp(config, new MongoTriviaRepository());

    server = app.listen(config.port, () => {
      console.log(`✓ Server running on port ${config.port}`);
      console.log(`✓ Environment: ${config.nodeEnv}`);
    });
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

const closeServer = (): Promise<void> =>
  new Promise((resolve, reject) => {
    if (!server) {
      resolve();
      return;
    }
    server.close((error) => (error ? reject(error) : resolve()));
  });

const shutdown = async (signal: string) => {
  console.log(`${signal} signal received: closing server gracefully`);
  try {
    await closeServer();
    await disconnectDatabase();
    process.exit(0);
  } catch (error) {
    console.error('❌ Error during shutdown:', error);
    process.exit(1);
  }
};

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

void startServer();
