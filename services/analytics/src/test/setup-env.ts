// Environment defaults so modules that validate config at import time can load under test.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL ??= 'silent';
process.env.DATABASE_URL ??= 'postgresql://localhost:5432/stockpulse_test';
process.env.REDIS_URL ??= 'redis://localhost:6379';
