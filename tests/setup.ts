// Keep stderr quiet while tests run
process.env.ENABLE_CONSOLE_LOGGING = 'false';
delete process.env.LOG_FILE;
