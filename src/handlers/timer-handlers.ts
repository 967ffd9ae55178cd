import type { Preferences } from '../lib/config';
import {
  calculateBilling,
  formatDurationDetailed,
  formatHours,
  formatMoney,
  parseTimestamp,
} from '../lib/time-format';
import { logger } from '../lib/logger';
import type { TrackerStores } from '../store';
import { CREATE_NEW, NO_CLIENT } from '../store/displayStore';
import type { ResultHandler } from './types';

export const UNKNOWN_PROJECT = 'Unknown Project';
export const RESET_PROMPT_MESSAGE = 'No active Clockify timer found, reset local timer?';

function projectName(stores: TrackerStores, projectId: string | null | undefined): string {
  if (!projectId) {
    return UNKNOWN_PROJECT;
  }
  return stores.reference.getState().findProject(projectId)?.name ?? UNKNOWN_PROJECT;
}

function selectedClientName(stores: TrackerStores): string {
  const selection = stores.display.getState().clientSelection;
  if (selection === CREATE_NEW || selection === NO_CLIENT) {
    return '';
  }
  return stores.reference.getState().findClient(selection)?.name ?? '';
}

export interface SessionReport {
  status: string;
  summary: string;
}

/** Строка статуса и многострочная сводка завершённой сессии с учётом настроек отображения. */
export function buildSessionReport(
  prefs: Preferences,
  session: { durationSeconds: number; projectName: string; taskDescription: string; clientName: string },
): SessionReport {
  const billing = calculateBilling(session.durationSeconds, prefs.hourlyRate);
  const duration = formatDurationDetailed(session.durationSeconds);
  const amount = formatMoney(billing.billableAmount);
  const hours = formatHours(billing.hours);

  const statusParts = [`Session complete: ${duration}`];
  if (prefs.showElapsedTime) statusParts.push(hours);
  if (prefs.showBillable) statusParts.push(`${amount} @ $${billing.rate}/hr`);

  if (!prefs.showLastSession) {
    return { status: statusParts.join(' • '), summary: '' };
  }

  const summary: string[] = [];
  if (prefs.showProjectName) summary.push(`Project: ${session.projectName}`);
  if (prefs.showTaskName) summary.push(`Task: ${session.taskDescription}`);
  if (prefs.showClientName && session.clientName) summary.push(`Client: ${session.clientName}`);
  if (prefs.showElapsedTime) summary.push(`Duration: ${duration}`);
  if (prefs.showBillable) summary.push(`Billable: ${amount} (${hours} @ $${billing.rate}/hr)`);

  return { status: statusParts.join(' • '), summary: summary.join('\n') };
}

export const handleTimerStarted: ResultHandler<'timerStarted'> = (entry, { stores, nowSeconds }) => {
  stores.timer.getState().setStartedAt(nowSeconds());

  const display = stores.display.getState();
  display.update({
    activeTimerId: entry.id,
    activeTimerDescription: entry.description ?? '',
    activeProjectId: entry.projectId ?? '',
    activeProjectName: projectName(stores, entry.projectId),
    activeClientName: selectedClientName(stores),
    status: 'Timer started successfully!',
    showNewProjectField: false,
    newProjectName: '',
    showNewClientField: false,
    newClientName: '',
    projectSelection: entry.projectId || display.projectSelection,
    createProjectChosen: false,
  });
};

export const handleTimerStopped: ResultHandler<'timerStopped'> = ({ entry, elapsedSeconds }, { stores }) => {
  const prefs = stores.preferences.getState().getPreferences();
  const display = stores.display.getState();

  stores.timer.getState().setStartedAt(null);
  stores.timer.getState().setLastSessionDuration(elapsedSeconds);

  const report = buildSessionReport(prefs, {
    durationSeconds: elapsedSeconds,
    projectName: projectName(stores, entry.projectId),
    taskDescription: entry.description || 'No description',
    clientName: display.activeClientName,
  });

  display.update({ status: report.status, lastSessionSummary: report.summary });
  display.clearActiveTimer();
};

export const handleNoActiveTimer: ResultHandler<'noActiveTimer'> = (_payload, { stores, confirmation }) => {
  const display = stores.display.getState();
  if (display.resetPromptShown) {
    logger.debug('TIMER', 'Reset prompt already pending, skipping');
    return;
  }
  display.update({ resetPromptShown: true, status: 'No active timer found on the server' });
  confirmation.requestTimerReset(RESET_PROMPT_MESSAGE);
};

export const handleCurrentTimerFetched: ResultHandler<'currentTimerFetched'> = (entry, { stores, nowSeconds }) => {
  const display = stores.display.getState();
  const timer = stores.timer.getState();

  if (!entry) {
    timer.setStartedAt(null);
    display.clearActiveTimer();
    display.setStatus('No timer currently running');
    return;
  }

  const startedAt = parseTimestamp(entry.timeInterval?.start);
  if (startedAt === null) {
    logger.warn('TIMER', `Unparsable start time "${entry.timeInterval?.start}", using now`);
  }
  timer.setStartedAt(startedAt ?? nowSeconds());

  const description = entry.description || 'No description';
  display.update({
    activeTimerId: entry.id,
    activeTimerDescription: description,
    activeProjectId: entry.projectId ?? '',
    activeProjectName: projectName(stores, entry.projectId),
    // Клиента по проекту без отдельного запроса не узнать
    activeClientName: '',
    status: `Timer running: ${description}`,
  });
};
