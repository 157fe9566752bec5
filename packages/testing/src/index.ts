/**
 * @fileoverview Test doubles for the overlay surface and host packages.
 */

export {
  createInMemoryHostTransport,
  type InMemoryConnectionHandlers,
  type InMemoryHostConnection,
  type InMemoryHostTransport,
} from './inMemoryHostTransport.js';
export { createMockBridge, type MockBridge } from './mockBridge.js';
export {
  createRecordingLogger,
  type LogRecord,
  type RecordedLevel,
  type RecordingLogger,
} from './recordingLogger.js';
export {
  createRecordingPresenter,
  type PresenterCall,
  type RecordingPresenter,
} from './recordingPresenter.js';
