export { createTracker, type Tracker, type TrackerOptions } from './tracker/tracker';
export { TrackerController, type ActionResult } from './tracker/controller';
export { renderPanel, renderTopbar, type DisplaySnapshot, type PanelSection } from './tracker/display';
export { clientOptions, filterProjectsForClient, projectOptions } from './tracker/selection';

export { ResultDispatcher, MAX_MESSAGES_PER_TICK, DISPATCH_INTERVAL_MS } from './queue/dispatcher';
export { ResultQueue } from './queue/result-queue';
export { SingleFlightGuard } from './queue/single-flight';
export { TaskLauncher } from './queue/task-launcher';
export type { FollowUp, OperationKind, QueueMessage, TaskResult } from './queue/messages';

export { createTrackerStores, type TrackerStores } from './store';
export { CREATE_NEW, NO_CLIENT } from './store/displayStore';

export { ApiClient, type TimeTrackingApi } from './lib/api';
export { defaultPreferences, loadPreferencesFromEnv, type Preferences } from './lib/config';
export * from './lib/errors';
export {
  calculateBilling,
  formatDurationDetailed,
  formatTimerDisplay,
  parseIsoDuration,
  parseTimerDisplay,
  type BillingInfo,
} from './lib/time-format';
export { logger, isLogLevel, type LogLevel } from './lib/logger';

export type { ConfirmationGate, DocumentFields, RefreshSignal, Scheduler, TrackerHost } from './host/types';
export { NodeScheduler } from './host/node-scheduler';
export { createFileDocument, createFileStateStorage } from './host/file-storage';
