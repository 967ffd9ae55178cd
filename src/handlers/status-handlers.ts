import { logger } from '../lib/logger';
import { setSentryUser } from '../lib/sentry';
import { calculateBilling, formatDurationDetailed, formatHours, formatMoney } from '../lib/time-format';
import type { ResultHandler } from './types';

export const handleProjectSummary: ResultHandler<'projectSummary'> = (summary, { stores }) => {
  const prefs = stores.preferences.getState().getPreferences();
  const duration = formatDurationDetailed(summary.totalSeconds);
  const billing = calculateBilling(summary.totalSeconds, prefs.hourlyRate);

  stores.display.getState().update({
    projectSummary:
      `This Month: ${duration} (${summary.entriesCount} sessions)\n` +
      `Billable: ${formatMoney(billing.billableAmount)} (${formatHours(billing.hours)} @ $${billing.rate}/hr)`,
    status: `Project status updated: ${duration} this month`,
  });
};

export const handleUserInfo: ResultHandler<'userInfo'> = (user, { stores }) => {
  stores.preferences.getState().updatePreferences({ userId: user.id });
  logger.info('CREDENTIALS', `Auto-filled user id ${user.id}`);
  setSentryUser({ id: user.id, username: user.name });
  stores.display.getState().setStatus(`Credentials verified! User: ${user.name || 'Unknown'}`);
};

export const handleError: ResultHandler<'error'> = ({ description }, { stores }) => {
  stores.display.getState().setStatus(`Error: ${description}`);
};
