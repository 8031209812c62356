/**
 * Mock Module Index
 *
 * Central exports for all Honeytrap test mocks
 */

export {
  MockLLMProvider,
  createMockProvider,
  type RecordedCall,
} from './provider.mock.js';
