import 'dotenv/config';
import { loadTlsFiles } from './config/tls.js';
import { createLogger } from './observability/logger.js';
import { createServer } from './api/server.js';
import type { KubernetesObject } from './api/types.js';
import { createValidator } from './validation/validator.js';

const logger = createLogger({ name: 'stowage' });

async function start(): Promise<void> {
  const port = Number(process.env['PORT'] ?? 9443);
  const host = process.env['HOST'] ?? '0.0.0.0';

  try {
    // Chains left unconfigured admit every request.
    const validator = createValidator<KubernetesObject>();
    const tlsResult = await loadTlsFiles({
      certFile: process.env['TLS_CERT_FILE'],
      keyFile: process.env['TLS_KEY_FILE'],
    });
    if (!tlsResult.ok) throw tlsResult.error;
    const tls = tlsResult.value;
    if (!tls) {
      logger.warn('TLS_CERT_FILE and TLS_KEY_FILE are unset; serving plain HTTP', {
        component: 'main',
      });
    }

    const server = createServer({ validator, logger }, { tls });

    // Graceful shutdown
    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...', { component: 'main' });
      await server.close();
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());

    await server.listen({ port, host });
    logger.info(`Server listening on ${host}:${port}`, { component: 'main', tls: !!tls });
  } catch (err: unknown) {
    logger.fatal('Failed to start server', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

void start();
