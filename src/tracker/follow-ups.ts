import { logger } from '../lib/logger';
import type { FollowUpExecutor } from '../queue/dispatcher';
import type { FollowUp, FollowUpOutcome, QueueMessage } from '../queue/messages';
import type { TaskLauncher } from '../queue/task-launcher';
import type { TrackerStores } from '../store';
import { applyClientSelection } from '../handlers/selection-sync';

type FollowUpOf<T extends FollowUp['type']> = Extract<FollowUp, { type: T }>;

function errorText(message: QueueMessage): string | null {
  return message.result.kind === 'error' ? message.result.payload.description : null;
}

/**
 * Цепочки после ответа: создание клиента → проекта → старт таймера,
 * выбор созданных сущностей после обновления списков, тексты ошибок.
 */
export class TrackerFollowUps implements FollowUpExecutor {
  constructor(
    private readonly stores: TrackerStores,
    private readonly launcher: TaskLauncher,
  ) {}

  run(followUp: FollowUp, message: QueueMessage): FollowUpOutcome {
    switch (followUp.type) {
      case 'startAfterClientCreated':
        return this.startAfterClientCreated(followUp, message);
      case 'startAfterProjectCreated':
        return this.startAfterProjectCreated(followUp, message);
      case 'startFinished':
        this.startFinished(followUp, message);
        return 'done';
      case 'selectCreatedClient':
        this.selectCreatedClient(followUp, message);
        return 'done';
      case 'selectProject':
        this.selectProject(followUp, message);
        return 'done';
      case 'reportRefresh':
        this.reportRefresh(followUp, message);
        return 'done';
      case 'reportError':
        this.reportError(followUp.prefix, message);
        return 'done';
    }
  }

  private setStatus(status: string): void {
    this.stores.display.getState().setStatus(status);
  }

  private reportError(prefix: string, message: QueueMessage): void {
    const error = errorText(message);
    if (error !== null) {
      this.setStatus(`${prefix}: ${error}`);
    }
  }

  private startAfterClientCreated(
    followUp: FollowUpOf<'startAfterClientCreated'>,
    message: QueueMessage,
  ): FollowUpOutcome {
    if (message.result.kind !== 'clientCreated') {
      this.reportError('Error creating client', message);
      return 'done';
    }
    const client = message.result.payload;

    // Новый клиент появится в списке после обновления
    void this.launcher.fetchClients({
      followUp: { type: 'selectCreatedClient', clientId: client.id, clientName: client.name },
    });

    // У нового клиента проектов нет — нужен новый проект
    if (!followUp.newProjectName) {
      this.setStatus('Error: Please enter a project name');
      return 'done';
    }

    this.setStatus('Creating project...');
    void this.launcher.createProject(followUp.newProjectName, client.id, {
      followUp: { type: 'startAfterProjectCreated', description: followUp.description, clientName: client.name },
      release: message.release,
    });
    return 'handover';
  }

  private startAfterProjectCreated(
    followUp: FollowUpOf<'startAfterProjectCreated'>,
    message: QueueMessage,
  ): FollowUpOutcome {
    if (message.result.kind !== 'projectCreated') {
      this.reportError('Error creating project', message);
      return 'done';
    }
    const project = message.result.payload;

    this.setStatus('Starting timer...');
    void this.launcher.startTimer(followUp.description, project.id, {
      followUp: {
        type: 'startFinished',
        projectName: project.name,
        clientName: followUp.clientName,
        createdProjectId: project.id,
      },
      release: message.release,
    });
    return 'handover';
  }

  private startFinished(followUp: FollowUpOf<'startFinished'>, message: QueueMessage): void {
    if (message.result.kind !== 'timerStarted') {
      this.reportError('Error starting timer', message);
      return;
    }

    // Имена известны вызывающему точнее, чем кэшу (проект мог только что появиться)
    this.stores.display.getState().update({
      activeProjectName: followUp.projectName,
      activeClientName: followUp.clientName,
    });

    if (followUp.createdProjectId) {
      void this.launcher.fetchProjects({
        followUp: { type: 'selectProject', projectId: followUp.createdProjectId },
      });
    }
  }

  private selectCreatedClient(followUp: FollowUpOf<'selectCreatedClient'>, message: QueueMessage): void {
    if (message.result.kind !== 'clientsFetched') {
      this.reportError('Error refreshing clients', message);
      return;
    }
    applyClientSelection(this.stores, followUp.clientId);
    this.stores.display.getState().update({
      newClientName: '',
      status: `Client '${followUp.clientName}' created successfully!`,
    });
  }

  private selectProject(followUp: FollowUpOf<'selectProject'>, message: QueueMessage): void {
    if (message.result.kind !== 'projectsFetched') {
      this.reportError('Error refreshing projects', message);
      return;
    }
    if (!this.stores.reference.getState().findProject(followUp.projectId)) {
      logger.warn('FOLLOW_UP', `Project ${followUp.projectId} missing after refresh`);
      return;
    }
    this.stores.display.getState().update({
      projectSelection: followUp.projectId,
      showNewProjectField: false,
      createProjectChosen: false,
    });
  }

  private reportRefresh(followUp: FollowUpOf<'reportRefresh'>, message: QueueMessage): void {
    const label = followUp.target === 'clients' ? 'Clients' : 'Projects';
    const expected = followUp.target === 'clients' ? 'clientsFetched' : 'projectsFetched';
    if (message.result.kind === expected) {
      this.setStatus(`${label} refreshed successfully!`);
    } else {
      this.reportError(`Error refreshing ${followUp.target}`, message);
    }
  }
}
