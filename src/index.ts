#!/usr/bin/env node
import { startMcpServer } from './server.js';

startMcpServer().catch((error) => {
  console.error('Fatal error in main():', error);
  process.exit(1);
});
