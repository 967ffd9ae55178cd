import type { TimeEntry } from '../lib/api';

export type OperationKind = 'start' | 'stop' | 'status';

export const OPERATION_KINDS: readonly OperationKind[] = ['start', 'stop', 'status'];

export interface ClientRef {
  id: string;
  name: string;
  description: string;
}

export interface ProjectRef {
  id: string;
  name: string;
  description: string;
  clientId: string | null;
}

export interface TimerStoppedPayload {
  entry: TimeEntry;
  elapsedSeconds: number;
}

export interface ProjectSummaryPayload {
  projectId: string;
  totalSeconds: number;
  entriesCount: number;
  monthStart: string;
  monthEnd: string;
}

export interface ErrorPayload {
  description: string;
}

/** Payload per result tag. */
export interface QueuePayloads {
  clientsFetched: ClientRef[];
  projectsFetched: ProjectRef[];
  clientCreated: { id: string; name: string };
  projectCreated: { id: string; name: string };
  timerStarted: TimeEntry;
  timerStopped: TimerStoppedPayload;
  noActiveTimer: null;
  currentTimerFetched: TimeEntry | null;
  projectSummary: ProjectSummaryPayload;
  userInfo: { id: string; name: string };
  error: ErrorPayload;
}

export type MessageKind = keyof QueuePayloads;

export type ResultOf<K extends MessageKind = MessageKind> = {
  [P in K]: { kind: P; payload: QueuePayloads[P] };
}[K];

export type TaskResult = ResultOf;

/**
 * Действие, которое диспетчер выполняет после встроенного обработчика.
 * Только данные — никаких замыканий.
 */
export type FollowUp =
  | { type: 'startAfterClientCreated'; description: string; newProjectName: string }
  | { type: 'startAfterProjectCreated'; description: string; clientName: string }
  | { type: 'startFinished'; projectName: string; clientName: string; createdProjectId?: string }
  | { type: 'selectCreatedClient'; clientId: string; clientName: string }
  | { type: 'selectProject'; projectId: string }
  | { type: 'reportRefresh'; target: 'clients' | 'projects' }
  | { type: 'reportError'; prefix: string };

export type FollowUpType = FollowUp['type'];

/** 'handover' — follow-up запустил новую задачу и передал ей single-flight флаг. */
export type FollowUpOutcome = 'done' | 'handover';

export interface QueueMessage {
  result: TaskResult;
  followUp?: FollowUp;
  /** Single-flight flag cleared once this message has been handled. */
  release?: OperationKind;
}

export interface LaunchOptions {
  followUp?: FollowUp;
  release?: OperationKind;
}
