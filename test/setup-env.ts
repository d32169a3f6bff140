import 'reflect-metadata';

process.env.JWT_SECRET = 'test-secret-test-secret-test-secret';
process.env.JWT_ISSUER = 'contact-book-test';
process.env.TOKEN_TTL_SECONDS = '3600';
process.env.BCRYPT_ROUNDS = '4';
process.env.DB_TYPE = 'better-sqlite3';
process.env.SQLITE_PATH = ':memory:';
process.env.DB_SYNCHRONIZE = 'true';
