import { DuplicateOperationError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { OperationKind } from '../queue/messages';
import type { SingleFlightGuard } from '../queue/single-flight';
import type { TaskLauncher } from '../queue/task-launcher';
import type { TrackerStores } from '../store';
import { CREATE_NEW, NO_CLIENT, UNSELECTED } from '../store/displayStore';
import { applyClientSelection } from '../handlers/selection-sync';
import { UNKNOWN_PROJECT } from '../handlers/timer-handlers';

export type ActionResult = { ok: true } | { ok: false; reason: string };

const OK: ActionResult = { ok: true };

const BUSY_MESSAGES: Record<OperationKind, string> = {
  start: 'Timer is already starting, please wait...',
  stop: 'Timer is already stopping, please wait...',
  status: 'Status check already in progress...',
};

function rejected(reason: string): ActionResult {
  return { ok: false, reason };
}

/**
 * Действия пользователя (кнопки панели). Сами ничего не ждут:
 * запускают фоновые задачи, результат приходит через диспетчер.
 */
export class TrackerController {
  constructor(
    private readonly stores: TrackerStores,
    private readonly launcher: TaskLauncher,
    private readonly guard: SingleFlightGuard,
  ) {}

  private get display() {
    return this.stores.display.getState();
  }

  private begin(kind: OperationKind): ActionResult {
    try {
      this.guard.tryBegin(kind);
      return OK;
    } catch (error) {
      if (error instanceof DuplicateOperationError) {
        return rejected(BUSY_MESSAGES[kind]);
      }
      throw error;
    }
  }

  isBusy(kind: OperationKind): boolean {
    return this.guard.isInProgress(kind);
  }

  startTimer(): ActionResult {
    const display = this.display;
    const description = display.taskDescription;
    const client = display.clientSelection;
    const project = display.projectSelection;
    const newClientName = display.newClientName.trim();
    const newProjectName = display.newProjectName.trim();

    if (client === CREATE_NEW && !newClientName) {
      return rejected('Please enter a client name');
    }
    if ((client === CREATE_NEW || project === CREATE_NEW) && !newProjectName) {
      return rejected('Please enter a project name');
    }
    if (client !== CREATE_NEW && project === UNSELECTED) {
      return rejected('Please select a project first');
    }

    const started = this.begin('start');
    if (!started.ok) {
      logger.warn('START', started.reason);
      return started;
    }

    if (client === CREATE_NEW) {
      display.setStatus('Creating client...');
      void this.launcher.createClient(newClientName, {
        followUp: { type: 'startAfterClientCreated', description, newProjectName },
        release: 'start',
      });
      return OK;
    }

    const reference = this.stores.reference.getState();
    if (client === NO_CLIENT) {
      reference.setSelectedClientId(null);
    } else if (reference.findClient(client)) {
      reference.setSelectedClientId(client);
    }
    const clientName = client === NO_CLIENT ? '' : reference.findClient(client)?.name ?? '';

    if (project === CREATE_NEW) {
      display.setStatus('Creating project...');
      void this.launcher.createProject(newProjectName, reference.getSelectedClientId(), {
        followUp: { type: 'startAfterProjectCreated', description, clientName },
        release: 'start',
      });
      return OK;
    }

    display.setStatus('Starting timer...');
    const projectName = reference.findProject(project)?.name ?? UNKNOWN_PROJECT;
    void this.launcher.startTimer(description, project, {
      followUp: { type: 'startFinished', projectName, clientName },
      release: 'start',
    });
    return OK;
  }

  stopTimer(): ActionResult {
    const started = this.begin('stop');
    if (!started.ok) {
      logger.warn('STOP', started.reason);
      return started;
    }
    this.display.setStatus('Stopping timer...');
    void this.launcher.stopTimer({
      followUp: { type: 'reportError', prefix: 'Error stopping timer' },
      release: 'stop',
    });
    return OK;
  }

  checkProjectStatus(): ActionResult {
    const project = this.display.projectSelection;
    if (!project || project === CREATE_NEW) {
      return rejected('Please select a project first');
    }
    const started = this.begin('status');
    if (!started.ok) {
      logger.warn('STATUS', started.reason);
      return started;
    }
    this.display.setStatus('Getting project status...');
    void this.launcher.getProjectSummary(project, {
      followUp: { type: 'reportError', prefix: 'Error getting project status' },
      release: 'status',
    });
    return OK;
  }

  checkTimer(): ActionResult {
    this.display.setStatus('Checking timer...');
    void this.launcher.getCurrentTimer();
    return OK;
  }

  checkCredentials(): ActionResult {
    const prefs = this.stores.preferences.getState().getPreferences();
    if (!prefs.apiKey || !prefs.workspaceId) {
      return rejected('Please enter API Key and Workspace ID first');
    }
    this.display.setStatus('Checking credentials...');
    void this.launcher.getUserInfo();
    return OK;
  }

  refreshClients(): ActionResult {
    this.display.setStatus('Refreshing clients...');
    void this.launcher.fetchClients({ followUp: { type: 'reportRefresh', target: 'clients' } });
    return OK;
  }

  refreshProjects(): ActionResult {
    this.display.setStatus('Refreshing projects...');
    void this.launcher.fetchProjects({ followUp: { type: 'reportRefresh', target: 'projects' } });
    return OK;
  }

  selectClient(clientSelection: string): void {
    applyClientSelection(this.stores, clientSelection);
  }

  selectProject(projectSelection: string): void {
    this.display.update({
      projectSelection,
      showNewProjectField: projectSelection === CREATE_NEW,
      createProjectChosen: projectSelection === CREATE_NEW,
    });
  }

  setTaskDescription(description: string): void {
    this.display.update({ taskDescription: description });
  }

  setNewClientName(name: string): void {
    this.display.update({ newClientName: name });
  }

  setNewProjectName(name: string): void {
    this.display.update({ newProjectName: name });
  }

  /** Ответ пользователя на вопрос "сбросить локальный таймер?". */
  acknowledgeReset(confirmed: boolean): void {
    if (confirmed) {
      this.resetTimer();
      return;
    }
    this.display.update({ resetPromptShown: false });
  }

  resetTimer(): void {
    this.stores.timer.getState().reset();
    this.display.clearActiveTimer();
    this.display.update({
      resetPromptShown: false,
      status: 'Timer reset - ready to start a new session',
    });
  }
}
