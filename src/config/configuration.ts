// src/config/configuration.ts
export default () => ({
    environment: process.env.NODE_ENV || 'development',
    port: parseInt(process.env.PORT ?? '', 10) || 3000,

    logging: {
        level: process.env.LOG_LEVEL || 'log',
        strategy: process.env.LOG_STRATEGY || 'winston',
    },
});
