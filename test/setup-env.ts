// Loaded by Jest before every test file; ConfigModule reads these at compile time.
process.env.NODE_ENV = 'test';
process.env.CACHE_DRIVER = 'memory';
process.env.JWT_SECRET = 'test-secret';
process.env.PASSWORD_RESET_SECRET = 'test-reset-secret';
process.env.PUBLIC_URL = 'http://api.test';
process.env.MAIL_HOST = '';
