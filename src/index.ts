import { createApp, createDependencies } from './presentation/app';
import { getConfig, validateConfig } from './config';

async function main(): Promise<void> {
    console.log('🔎 Site Insights API - starting...');

    try {
        // 1. Load and validate configuration
        console.log('📋 Loading configuration...');
        const config = getConfig();

        console.log('🔍 Validating configuration...');
        const warnings = validateConfig(config);
        warnings.forEach((warning) => console.warn(`⚠️  ${warning}`));

        // 2. Create and start the app
        console.log('🚀 Initializing application components...');
        const deps = createDependencies(config);
        const app = createApp(config, deps);

        const server = app.listen(config.port, () => {
            console.log(`✅ Server running on http://localhost:${config.port}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Store: ${config.redisUrl ? 'redis' : 'in-memory'}`);
        });

        const shutdown = (signal: string) => {
            console.log(`🛑 ${signal} received, shutting down...`);
            server.close();
            deps.shutdown()
                .then(() => process.exit(0))
                .catch((error) => {
                    console.error('Error during shutdown:', error);
                    process.exit(1);
                });
        };
        process.on('SIGTERM', () => shutdown('SIGTERM'));
        process.on('SIGINT', () => shutdown('SIGINT'));
    } catch (error) {
        console.error('💥 Fatal error during bootstrap:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
