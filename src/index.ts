import { config, validateConfig } from './config';
import { ApiServer } from './api/server';
import { createPipeline } from './services/pipeline';

async function main() {
  try {
    console.log('🚀 Starting meeting enrichment pipeline...');

    validateConfig();
    console.log('✅ Configuration validated');

    const server = new ApiServer(createPipeline(config));
    const httpServer = server.start();

    const shutdown = (signal: string) => {
      console.log(`\n🛑 Received ${signal}, shutting down gracefully...`);
      httpServer.close(() => process.exit(0));
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    console.error('❌ Failed to start application:', error);
    process.exit(1);
  }
}

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error);
  process.exit(1);
});

void main();
