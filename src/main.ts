/**
 * SERVICE STARTUP SCRIPT
 *
 * Connects the production effects and starts the HTTP API.
 *
 * Run this with: npm run build && npm start
 */
import {Server} from 'node:http';
import {loadConfigFromEnv} from './effects/config';
import {makeAppEffects, ProductionEffects} from './effects/EffectsFactory';
import {createApp} from './http/app';

async function main(): Promise<void> {
  console.log('🚀 Starting ordering service...\n');

  const config = loadConfigFromEnv();
  const effects = await makeAppEffects(config);

  console.log('📋 Configuration:');
  console.log('   - PostgreSQL:', `${config.database.host}:${config.database.port}/${config.database.database}`);
  console.log('   - Redis:', `${config.redis.host}:${config.redis.port}`);
  console.log('   - SMTP:', `${config.email.host}:${config.email.port}`);
  console.log('   - Session TTL:', `${config.session.ttlSeconds}s`);
  console.log('');

  const app = createApp(effects, {sessionTtlSeconds: config.session.ttlSeconds});
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.api.port, () => {
      console.log(`🌐 API server started on port ${config.api.port}`);
      console.log(`   - Place order: POST http://localhost:${config.api.port}/place_order`);
      console.log(`   - Health check: GET http://localhost:${config.api.port}/health`);
      resolve(listening);
    });
  });

  registerShutdown(server, effects);
}

function registerShutdown(server: Server, effects: ProductionEffects): void {
  const shutdown = (signal: string) => {
    console.log(`\n⏸️  Received ${signal}, shutting down gracefully...`);
    server.close(() => {
      effects.close().then(
        () => process.exit(0),
        (error) => {
          console.error('❌ Failed to close connections:', error);
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  console.error('💥 Failed to start ordering service:', error);
  process.exit(1);
});
