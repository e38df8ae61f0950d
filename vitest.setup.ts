process.env.NODE_ENV = 'test';
process.env.DATABASE_URL ??= 'postgresql://test';
process.env.LEDGER_BANK_CAP = '100';
process.env.LEDGER_PER_WITHDRAWAL_CAP = '10';
process.env.LEDGER_CHANNEL = 'mock';
process.env.NOTIFIER_WEBHOOK_URL = 'http://hooks.test/ledger-events';
process.env.NOTIFIER_WEBHOOK_SECRET = 'test-secret';
