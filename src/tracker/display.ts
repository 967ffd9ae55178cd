import type { Preferences } from '../lib/config';
import { calculateBilling, formatDurationDetailed, formatMoney, formatTimerDisplay } from '../lib/time-format';
import type { DisplayFields } from '../store/displayStore';

const MAX_TOPBAR_PROJECT_LENGTH = 15;
const TRUNCATED_PROJECT_LENGTH = 12;

export interface DisplaySnapshot {
  fields: DisplayFields;
  preferences: Preferences;
  /** Elapsed seconds of the running session. */
  currentDuration: number;
}

export interface PanelSection {
  title: string | null;
  lines: string[];
}

function nonEmptyLines(text: string): string[] {
  return text.split('\n').filter((line) => line.trim() !== '');
}

export function truncateProjectName(name: string): string {
  if (name.length > MAX_TOPBAR_PROJECT_LENGTH) {
    return `${name.slice(0, TRUNCATED_PROJECT_LENGTH)}...`;
  }
  return name;
}

/**
 * Строка таймера для верхней панели. null — показывать нечего
 * (отключено в настройках или таймер не запущен).
 */
export function renderTopbar({ fields, preferences, currentDuration }: DisplaySnapshot): string | null {
  if (!preferences.showTopbarTimer || !fields.activeTimerId) {
    return null;
  }

  const parts = [`⏱ ${formatTimerDisplay(currentDuration)}`];

  if (preferences.showBillable) {
    const billing = calculateBilling(currentDuration, preferences.hourlyRate);
    if (billing.hours > 0) {
      parts.push(formatMoney(billing.billableAmount));
    }
  }

  if (preferences.showProjectName && fields.activeProjectName) {
    parts.push(`(${truncateProjectName(fields.activeProjectName)})`);
  }

  return parts.join(' ');
}

export function renderPanel({ fields, preferences, currentDuration }: DisplaySnapshot): PanelSection[] {
  const sections: PanelSection[] = [];

  if (fields.status) {
    sections.push({ title: null, lines: fields.status.split('\n') });
  }

  if (fields.projectSummary) {
    // Месячная сводка видна всегда, скрывается только строка Billable
    const lines = nonEmptyLines(fields.projectSummary)
      .filter((line) => preferences.showBillable || !line.includes('Billable:'))
      .map((line) => `  ${line}`);
    sections.push({ title: 'Project Summary:', lines });
  }

  if (fields.activeTimerId) {
    const lines: string[] = [];
    if (preferences.showTaskName) {
      lines.push(`Task: ${fields.activeTimerDescription}`);
    }
    if (preferences.showProjectName && fields.activeProjectName) {
      lines.push(`Project: ${fields.activeProjectName}`);
    }
    if (preferences.showClientName && fields.activeClientName) {
      lines.push(`Client: ${fields.activeClientName}`);
    }
    if (preferences.showElapsedTime) {
      lines.push(`Elapsed: ${formatDurationDetailed(currentDuration)}`);
    }
    if (preferences.showBillable) {
      const billing = calculateBilling(currentDuration, preferences.hourlyRate);
      if (billing.hours > 0) {
        lines.push(`Billable: ${formatMoney(billing.billableAmount)} @ $${preferences.hourlyRate}/hr`);
      }
    }
    sections.push({ title: '⏱ Active Timer:', lines });
  }

  if (preferences.showLastSession && fields.lastSessionSummary) {
    sections.push({
      title: 'Last Session:',
      lines: nonEmptyLines(fields.lastSessionSummary).map((line) => `  ${line}`),
    });
  }

  return sections;
}
