import { describe, it, expect } from 'vitest';
import { initialDisplayFields, type DisplayFields } from '../../store/displayStore';
import { testPreferences } from '../../test/fakes';
import { renderPanel, renderTopbar, truncateProjectName, type DisplaySnapshot } from '../display';

function snapshot(fields: Partial<DisplayFields>, overrides: Partial<DisplaySnapshot> = {}): DisplaySnapshot {
  return {
    fields: { ...initialDisplayFields(), ...fields },
    preferences: testPreferences,
    currentDuration: 0,
    ...overrides,
  };
}

const running: Partial<DisplayFields> = {
  activeTimerId: 'te1',
  activeTimerDescription: 'Design review',
  activeProjectName: 'Website',
  activeClientName: 'Acme',
};

describe('renderTopbar', () => {
  it('shows nothing without an active timer', () => {
    expect(renderTopbar(snapshot({}, { currentDuration: 100 }))).toBeNull();
  });

  it('shows elapsed time, amount and project', () => {
    expect(renderTopbar(snapshot(running, { currentDuration: 3661 }))).toBe('⏱ 01:01:01 $25.42 (Website)');
  });

  it('omits the amount at zero elapsed time', () => {
    expect(renderTopbar(snapshot(running))).toBe('⏱ 00:00:00 (Website)');
  });

  it('respects the top bar toggle', () => {
    const hidden = snapshot(running, { preferences: { ...testPreferences, showTopbarTimer: false } });
    expect(renderTopbar(hidden)).toBeNull();
  });

  it('truncates long project names', () => {
    expect(truncateProjectName('Quarterly Planning')).toBe('Quarterly Pl...');
    expect(truncateProjectName('Fifteen chars!!')).toBe('Fifteen chars!!');
  });
});

describe('renderPanel', () => {
  it('renders status, active timer and last session', () => {
    const sections = renderPanel(
      snapshot(
        { ...running, status: 'Timer started successfully!', lastSessionSummary: 'Project: Website\n\nDuration: 5m' },
        { currentDuration: 1800 },
      ),
    );

    expect(sections).toEqual([
      { title: null, lines: ['Timer started successfully!'] },
      {
        title: '⏱ Active Timer:',
        lines: [
          'Task: Design review',
          'Project: Website',
          'Client: Acme',
          'Elapsed: 30m',
          'Billable: $12.50 @ $25/hr',
        ],
      },
      { title: 'Last Session:', lines: ['  Project: Website', '  Duration: 5m'] },
    ]);
  });

  it('hides the billable line of the month summary when billing is off', () => {
    const sections = renderPanel(
      snapshot(
        { projectSummary: 'This Month: 1h (2 sessions)\nBillable: $25.00 (1.00h @ $25/hr)' },
        { preferences: { ...testPreferences, showBillable: false } },
      ),
    );

    expect(sections).toEqual([{ title: 'Project Summary:', lines: ['  This Month: 1h (2 sessions)'] }]);
  });

  it('hides the last session when disabled', () => {
    const sections = renderPanel(
      snapshot({ lastSessionSummary: 'Duration: 5m' }, { preferences: { ...testPreferences, showLastSession: false } }),
    );
    expect(sections).toEqual([]);
  });
});
