import { loadConfigFromEnvironment, ConfigError } from './config';
import { ConnectionFactory, createPool } from './lib/database';
import { createApp } from './app';

async function main() {
  const config = loadConfigFromEnvironment();
  const connections = new ConnectionFactory(createPool(config.databaseUrl));
  await connections.migrate();

  const app = createApp({ config, connections });

  app.listen(config.port, () => {
    console.log(`🚀 Server is running on http://localhost:${config.port}`);
    console.log(`📝 API index: http://localhost:${config.port}/api`);
  });
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
    console.error('Please check your .env file');
  } else {
    console.error('Failed to start server:', error);
  }
  process.exit(1);
});
