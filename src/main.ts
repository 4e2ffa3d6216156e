import { startApp, stopApp } from './index';
import { zone, errorMessage } from './logging/zone';

const log = zone('main');

function shutdown(signal: NodeJS.Signals): void {
    log.info({ message: 'Shutting down gracefully...', data: { signal } });
    stopApp().then(
        () => process.exit(0),
        (err: unknown) => {
            log.error({ message: 'Error during shutdown', data: { error: errorMessage(err) } });
            process.exit(1);
        }
    );
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

startApp().catch((err: unknown) => {
    log.error({ message: 'Initialization error', data: { error: errorMessage(err) } });
    process.exit(1);
});
