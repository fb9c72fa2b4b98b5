export { createTestStore } from './test-store.js';
