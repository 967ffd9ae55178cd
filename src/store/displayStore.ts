import { createStore, type StoreApi } from 'zustand/vanilla';

export const CREATE_NEW = 'CREATE_NEW';
export const NO_CLIENT = 'NONE';
/** Nothing picked yet; the first reference fetch resolves it. */
export const UNSELECTED = '';
export const DEFAULT_TASK_DESCRIPTION = 'Untitled';

/**
 * Поля документа хоста: выбор клиента/проекта, строка статуса, сводки.
 * Мутируется только на главном контексте (диспетчер и контроллер).
 */
export interface DisplayFields {
  clientSelection: string;
  newClientName: string;
  showNewClientField: boolean;
  taskDescription: string;
  projectSelection: string;
  newProjectName: string;
  showNewProjectField: boolean;
  /** CREATE_NEW was picked by the user, not reached as a fallback. */
  createProjectChosen: boolean;

  status: string;
  lastSessionSummary: string;
  projectSummary: string;

  activeTimerId: string;
  activeTimerDescription: string;
  activeProjectId: string;
  activeProjectName: string;
  activeClientName: string;

  /** One-shot guard for the "no active timer" confirmation. */
  resetPromptShown: boolean;
}

export interface DisplayState extends DisplayFields {
  update: (patch: Partial<DisplayFields>) => void;
  setStatus: (status: string) => void;
  clearActiveTimer: () => void;
  hasActiveTimer: () => boolean;
}

export type DisplayStore = StoreApi<DisplayState>;

export const initialDisplayFields = (): DisplayFields => ({
  clientSelection: UNSELECTED,
  newClientName: '',
  showNewClientField: false,
  taskDescription: DEFAULT_TASK_DESCRIPTION,
  projectSelection: UNSELECTED,
  newProjectName: '',
  showNewProjectField: false,
  createProjectChosen: false,

  status: '',
  lastSessionSummary: '',
  projectSummary: '',

  activeTimerId: '',
  activeTimerDescription: '',
  activeProjectId: '',
  activeProjectName: '',
  activeClientName: '',

  resetPromptShown: false,
});

export function createDisplayStore(): DisplayStore {
  return createStore<DisplayState>()((set, get) => ({
    ...initialDisplayFields(),

    update: (patch) => set(patch),
    setStatus: (status) => set({ status }),

    clearActiveTimer: () =>
      set({
        activeTimerId: '',
        activeTimerDescription: '',
        activeProjectId: '',
        activeProjectName: '',
        activeClientName: '',
      }),

    hasActiveTimer: () => get().activeTimerId !== '',
  }));
}
