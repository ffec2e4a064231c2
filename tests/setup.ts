import { vi } from 'vitest';

// Keep protocol traces out of the test output
vi.spyOn(console, 'log').mockImplementation(() => undefined);
vi.spyOn(console, 'debug').mockImplementation(() => undefined);
vi.spyOn(console, 'warn').mockImplementation(() => undefined);
vi.spyOn(console, 'error').mockImplementation(() => undefined);
