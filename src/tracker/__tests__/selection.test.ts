import { describe, it, expect } from 'vitest';
import type { ProjectRef } from '../../queue/messages';
import { CREATE_NEW, NO_CLIENT } from '../../store/displayStore';
import { clientOptions, filterProjectsForClient, projectOptions, resolveSelection } from '../selection';

const projects: ProjectRef[] = [
  { id: 'p1', name: 'Website', description: 'Website', clientId: 'c1' },
  { id: 'p3', name: 'Internal', description: 'Internal', clientId: null },
  { id: 'p4', name: 'Billing Portal', description: 'Billing Portal', clientId: 'c2' },
];

describe('filterProjectsForClient', () => {
  it('returns projects of the given client', () => {
    expect(filterProjectsForClient(projects, 'c2').map((p) => p.id)).toEqual(['p4']);
  });

  it('returns unassigned projects for NONE', () => {
    expect(filterProjectsForClient(projects, NO_CLIENT).map((p) => p.id)).toEqual(['p3']);
  });

  it('returns nothing while a new client is being created', () => {
    expect(filterProjectsForClient(projects, CREATE_NEW)).toEqual([]);
  });
});

describe('options', () => {
  it('wraps clients in the None and Create sentinels', () => {
    const options = clientOptions([{ id: 'c1', name: 'Acme', description: 'Acme' }]);
    expect(options.map((o) => o.id)).toEqual([NO_CLIENT, 'c1', CREATE_NEW]);
    expect(options[0].label).toBe('None (No Client)');
    expect(options[2].label).toBe('+ Create New Client...');
  });

  it('lists the filtered projects followed by Create', () => {
    const options = projectOptions(projects, 'c1');
    expect(options.map((o) => o.label)).toEqual(['Website', '+ Create New Project...']);
  });
});

describe('resolveSelection', () => {
  it('keeps a valid selection', () => {
    expect(resolveSelection('b', ['a', 'b'])).toBe('b');
  });

  it('falls back to the first id, then CREATE_NEW', () => {
    expect(resolveSelection('x', ['a', 'b'])).toBe('a');
    expect(resolveSelection('x', [])).toBe(CREATE_NEW);
  });
});
