// services/shutdown.service.ts
import type { Server } from 'http';
import type { AppContext } from '@services/app-context';
import { logger } from '@utils/logger';

// Delay in milliseconds before forced exit
const FORCE_EXIT_DELAY = 10_000;

export class ShutdownService {
    private static shuttingDown = false;

    static async handleGracefulShutdown(server: Server, context: AppContext): Promise<void> {
        if (this.shuttingDown) return;
        this.shuttingDown = true;
        logger.warn('🔴 Graceful shutdown initiated... Cleaning up resources.');

        // 🔥 If shutdown takes too long, force exit
        const forceExit = setTimeout(() => {
            logger.error('⏳ Shutdown taking too long! Forcing exit...');
            process.exit(1);
        }, FORCE_EXIT_DELAY);
        forceExit.unref();

        try {
            await new Promise<void>((resolve, reject) => {
                server.close((err) => (err ? reject(err) : resolve()));
            });
            logger.info('✅ HTTP server closed successfully.');

            await context.close();
            logger.info('✅ Storage closed.');

            logger.info('Graceful shutdown completed successfully');
            process.exit(0);
        } catch (error) {
            logger.error('❌ Error during shutdown:', error);
            process.exit(1);
        }
    }
}
