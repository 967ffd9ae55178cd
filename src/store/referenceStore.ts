import { createStore, type StoreApi } from 'zustand/vanilla';
import type { ClientRef, ProjectRef } from '../queue/messages';

/**
 * Кэш справочников: клиенты, проекты, выбранный клиент.
 * Коллекции заменяются целиком; наружу отдаются только копии.
 */
export interface ReferenceState {
  clients: ClientRef[];
  projects: ProjectRef[];
  selectedClientId: string | null;

  getClients: () => ClientRef[];
  setClients: (clients: ClientRef[]) => void;
  getProjects: () => ProjectRef[];
  setProjects: (projects: ProjectRef[]) => void;
  getSelectedClientId: () => string | null;
  setSelectedClientId: (clientId: string | null) => void;
  findClient: (clientId: string) => ClientRef | null;
  findProject: (projectId: string) => ProjectRef | null;
}

export type ReferenceStore = StoreApi<ReferenceState>;

export function createReferenceStore(): ReferenceStore {
  return createStore<ReferenceState>()((set, get) => ({
    clients: [],
    projects: [],
    selectedClientId: null,

    getClients: () => get().clients.map((client) => ({ ...client })),
    setClients: (clients) => set({ clients: clients.map((client) => ({ ...client })) }),

    getProjects: () => get().projects.map((project) => ({ ...project })),
    setProjects: (projects) => set({ projects: projects.map((project) => ({ ...project })) }),

    getSelectedClientId: () => get().selectedClientId,
    setSelectedClientId: (clientId) => set({ selectedClientId: clientId }),

    findClient: (clientId) => {
      const client = get().clients.find((c) => c.id === clientId);
      return client ? { ...client } : null;
    },
    findProject: (projectId) => {
      const project = get().projects.find((p) => p.id === projectId);
      return project ? { ...project } : null;
    },
  }));
}
