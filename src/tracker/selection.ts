import type { ClientRef, ProjectRef } from '../queue/messages';
import { CREATE_NEW, NO_CLIENT } from '../store/displayStore';

export interface SelectionOption {
  id: string;
  label: string;
  description: string;
}

/**
 * NO_CLIENT → проекты без клиента, CREATE_NEW → ничего,
 * иначе — проекты выбранного клиента.
 */
export function filterProjectsForClient(projects: ProjectRef[], clientSelection: string): ProjectRef[] {
  if (clientSelection === CREATE_NEW) {
    return [];
  }
  if (clientSelection === NO_CLIENT) {
    return projects.filter((project) => !project.clientId);
  }
  return projects.filter((project) => project.clientId === clientSelection);
}

export function clientOptions(clients: ClientRef[]): SelectionOption[] {
  return [
    { id: NO_CLIENT, label: 'None (No Client)', description: 'Show projects without assigned clients' },
    ...clients.map((client) => ({ id: client.id, label: client.name, description: client.description })),
    { id: CREATE_NEW, label: '+ Create New Client...', description: 'Create a new client' },
  ];
}

export function projectOptions(projects: ProjectRef[], clientSelection: string): SelectionOption[] {
  return [
    ...filterProjectsForClient(projects, clientSelection).map((project) => ({
      id: project.id,
      label: project.name,
      description: project.description,
    })),
    { id: CREATE_NEW, label: '+ Create New Project...', description: 'Create a new project' },
  ];
}

/** Keeps a still-valid selection, otherwise the first id or CREATE_NEW. */
export function resolveSelection(current: string, validIds: string[]): string {
  if (validIds.includes(current)) {
    return current;
  }
  return validIds[0] ?? CREATE_NEW;
}
