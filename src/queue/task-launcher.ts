import type { TimeTrackingApi } from '../lib/api';
import { describeFailure, NoActiveTimerError } from '../lib/errors';
import { logger } from '../lib/logger';
import { currentMonthRange, parseIsoDuration } from '../lib/time-format';
import type { TimerStore } from '../store/timerStore';
import type { LaunchOptions, TaskResult } from './messages';
import type { ResultQueue } from './result-queue';

export type Clock = () => number;

/**
 * Фоновые задачи: одна задача на удалённую операцию.
 * Каждая задача кладёт в очередь ровно одно сообщение и никогда не бросает наружу.
 */
export class TaskLauncher {
  private readonly inFlight = new Set<Promise<void>>();
  private session = 0;

  constructor(
    private readonly api: TimeTrackingApi,
    private readonly queue: ResultQueue,
    private readonly timer: TimerStore,
    /** Milliseconds since epoch. */
    private readonly now: Clock = Date.now,
  ) {}

  get pendingCount(): number {
    return this.inFlight.size;
  }

  /**
   * Tasks already running finish, but their results are dropped:
   * their release tags belong to flags that were reset meanwhile.
   */
  abandonInFlight(): void {
    this.session += 1;
  }

  /** Resolves once every task spawned so far has posted its message. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  fetchClients(options: LaunchOptions = {}): Promise<void> {
    return this.spawn('Failed to fetch clients', options, async () => {
      const clients = await this.api.getClients();
      return {
        kind: 'clientsFetched',
        payload: clients.map((c) => ({ id: c.id, name: c.name, description: c.name })),
      };
    });
  }

  createClient(name: string, options: LaunchOptions = {}): Promise<void> {
    return this.spawn('Failed to create client', options, async () => {
      const client = await this.api.createClient(name);
      return { kind: 'clientCreated', payload: { id: client.id, name: client.name } };
    });
  }

  fetchProjects(options: LaunchOptions = {}): Promise<void> {
    return this.spawn('Failed to fetch projects', options, async () => {
      const projects = await this.api.getProjects();
      return {
        kind: 'projectsFetched',
        payload: projects.map((p) => ({
          id: p.id,
          name: p.name,
          description: p.name,
          clientId: p.clientId ?? null,
        })),
      };
    });
  }

  createProject(name: string, clientId: string | null, options: LaunchOptions = {}): Promise<void> {
    return this.spawn('Failed to create project', options, async () => {
      const project = await this.api.createProject(name, clientId);
      return { kind: 'projectCreated', payload: { id: project.id, name: project.name } };
    });
  }

  startTimer(description: string, projectId: string, options: LaunchOptions = {}): Promise<void> {
    return this.spawn('Failed to start timer', options, async () => {
      const entry = await this.api.startTimeEntry({ description, projectId });
      return { kind: 'timerStarted', payload: entry };
    });
  }

  /**
   * GET активной записи → длительность по локальному старту → PUT с end.
   */
  stopTimer(options: LaunchOptions = {}): Promise<void> {
    return this.spawn('Failed to stop timer', options, async () => {
      const running = await this.api.getInProgressEntries();
      const current = running[0];
      if (!current) {
        throw new NoActiveTimerError();
      }

      const nowMs = this.now();
      const startedAt = this.timer.getState().getStartedAt();
      let elapsedSeconds = this.timer.getState().getLastSessionDuration();
      if (startedAt !== null) {
        elapsedSeconds = Math.max(0, nowMs / 1000 - startedAt);
        this.timer.getState().setLastSessionDuration(elapsedSeconds);
      }

      await this.api.updateTimeEntry(current.id, {
        start: current.timeInterval.start,
        end: new Date(nowMs).toISOString(),
        billable: current.billable ?? false,
        description: current.description ?? '',
        projectId: current.projectId ?? null,
        taskId: current.taskId ?? null,
        tagIds: current.tagIds ?? [],
      });

      return { kind: 'timerStopped', payload: { entry: current, elapsedSeconds } };
    });
  }

  getCurrentTimer(options: LaunchOptions = {}): Promise<void> {
    return this.spawn('Failed to get current timer', options, async () => {
      const running = await this.api.getInProgressEntries();
      return { kind: 'currentTimerFetched', payload: running[0] ?? null };
    });
  }

  getProjectSummary(projectId: string, options: LaunchOptions = {}): Promise<void> {
    return this.spawn('Failed to fetch project summary', options, async () => {
      const { start, end } = currentMonthRange(this.now());
      const entries = await this.api.getTimeEntries({
        start: start.toISOString(),
        end: end.toISOString(),
        project: projectId,
      });
      const totalSeconds = entries.reduce(
        (sum, entry) => sum + parseIsoDuration(entry.timeInterval?.duration),
        0,
      );
      return {
        kind: 'projectSummary',
        payload: {
          projectId,
          totalSeconds,
          entriesCount: entries.length,
          monthStart: start.toISOString(),
          monthEnd: end.toISOString(),
        },
      };
    });
  }

  getUserInfo(options: LaunchOptions = {}): Promise<void> {
    return this.spawn('Failed to get user info', options, async () => {
      const user = await this.api.getCurrentUser();
      return { kind: 'userInfo', payload: { id: user.id, name: user.name } };
    });
  }

  private spawn(action: string, options: LaunchOptions, work: () => Promise<TaskResult>): Promise<void> {
    const task: Promise<void> = this.execute(action, options, work).then(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
    return task;
  }

  private async execute(action: string, options: LaunchOptions, work: () => Promise<TaskResult>): Promise<void> {
    const session = this.session;
    let result: TaskResult;
    try {
      result = await work();
    } catch (error) {
      if (error instanceof NoActiveTimerError) {
        logger.info('TASK', error.message);
        result = { kind: 'noActiveTimer', payload: null };
      } else {
        const description = describeFailure(action, error);
        logger.warn('TASK', description);
        result = { kind: 'error', payload: { description } };
      }
    }
    if (session !== this.session) {
      logger.debug('TASK', `Dropping "${result.kind}" from an abandoned session`);
      return;
    }
    this.queue.enqueue({ result, followUp: options.followUp, release: options.release });
  }
}
