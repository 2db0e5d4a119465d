import { createApp } from './app';
import { config } from './config/env';
import { EventQueue } from './lib/event-queue';
import { createIngressService } from './services/ingress.service';

async function main(): Promise<void> {
  const ingressService = await createIngressService();
  const queue = new EventQueue();
  const app = createApp({ ingressService, queue, eventTokens: config.eventTokens });

  app.listen(config.port, config.host, () => {
    console.log(`ingress controller listening on http://${config.host}:${config.port}`);
  });

  // Converge once at start-up from whatever configuration and cached relation data exist.
  try {
    const status = await queue.run('start', () => ingressService.onConfigChanged());
    console.info(`Start-up reconcile finished (${status.name}: ${status.message || 'no message'})`);
  } catch (error) {
    console.error('Start-up reconcile failed; waiting for the next event', error);
  }
}

main().catch((error: unknown) => {
  console.error('Ingress controller failed to start', error);
  process.exit(1);
});
