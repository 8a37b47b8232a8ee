import { afterAll, afterEach, beforeAll } from 'vitest';
import { server } from '../utils/msw/node';

// Start MSW (node) so no test reaches the network
beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());
