/**
 * Test Support Module
 *
 * Fixtures and in-process fakes shared across test files.
 */

export {
  createFakeChannelSource,
  createFakeCompletionService,
  createTestLogger,
  type FakeChannelOptions
} from './fakes'
export { createMessage, createReport, failureRecord, successRecord } from './reports'
