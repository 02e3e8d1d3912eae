import { createApp } from './infrastructure/http/createApp.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const container = new AppContainer();
const app = createApp(container);
const port = container.config.app.port;

const server = app.listen(port, () => {
  console.log(`🚀 Finance LLM Provider listening on port ${port}`);
  console.log(`🤖 OpenRouter: ${container.hasOpenRouter() ? 'configured' : 'not configured'}`);
  console.log(`📈 Langfuse tracing: ${container.hasTracing() ? 'enabled' : 'disabled'}`);
});

const shutdown = (signal: NodeJS.Signals) => {
  console.log(`${signal} received, shutting down`);

  server.close(() => {
    container.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      },
    );
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
