import { createApp, createServices } from './app';
import { loadConfig } from './config';
import { log, setLogLevel } from './log';

/**
 * Main application entry point.
 */
async function main() {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const services = createServices(config);
    const app = createApp(config, services);

    app.listen(config.port, () => {
        log('info', 'server', 'listening', { port: config.port, tokenIdScheme: config.tokenIdScheme });
    });
}

main().catch(err => {
    log('error', 'server', 'startup_failed', { error: err instanceof Error ? err.message : String(err) });
    process.exitCode = 1;
});
