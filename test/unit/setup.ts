import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { vi } from 'vitest';

// Mock environment variables
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';

// Keep the Nest default logger quiet; use cases log through it
Logger.overrideLogger(false);

// Increase timeout for async operations
vi.setConfig({ testTimeout: 10000 });
