import axios, { type AxiosInstance } from 'axios';
import { toApiError, ConfigurationError } from './errors';
import { logger } from './logger';

/** Учётные данные читаются на каждый запрос: настройки могут поменяться в любой момент. */
export interface ApiCredentials {
  apiKey: string;
  workspaceId: string;
  userId: string;
}

export interface ApiClientOptions {
  baseURL: string;
  timeoutMs: number;
  credentials: () => ApiCredentials;
}

export interface RemoteClient {
  id: string;
  name: string;
}

export interface RemoteProject {
  id: string;
  name: string;
  clientId?: string | null;
}

export interface TimeInterval {
  start: string;
  end?: string | null;
  duration?: string | null;
}

export interface TimeEntry {
  id: string;
  description: string;
  projectId: string | null;
  taskId?: string | null;
  tagIds?: string[] | null;
  billable?: boolean;
  timeInterval: TimeInterval;
}

export interface RemoteUser {
  id: string;
  name: string;
}

export interface StartTimeEntryRequest {
  description: string;
  projectId: string;
}

export interface UpdateTimeEntryRequest {
  start: string;
  end: string;
  billable: boolean;
  description: string;
  projectId: string | null;
  taskId: string | null;
  tagIds: string[];
}

export interface TimeEntriesQuery {
  start: string;
  end: string;
  project: string;
}

/** Методы удалённого сервиса, которые использует трекер. */
export interface TimeTrackingApi {
  getClients(): Promise<RemoteClient[]>;
  createClient(name: string): Promise<RemoteClient>;
  getProjects(): Promise<RemoteProject[]>;
  createProject(name: string, clientId: string | null): Promise<RemoteProject>;
  getInProgressEntries(): Promise<TimeEntry[]>;
  startTimeEntry(data: StartTimeEntryRequest): Promise<TimeEntry>;
  updateTimeEntry(id: string, data: UpdateTimeEntryRequest): Promise<TimeEntry>;
  getTimeEntries(query: TimeEntriesQuery): Promise<TimeEntry[]>;
  getCurrentUser(): Promise<RemoteUser>;
}

export const NEW_PROJECT_COLOR = '#3498db';

export class ApiClient implements TimeTrackingApi {
  private client: AxiosInstance;
  private credentials: () => ApiCredentials;

  constructor(options: ApiClientOptions) {
    this.credentials = options.credentials;
    this.client = axios.create({
      baseURL: options.baseURL,
      headers: {
        'Content-Type': 'application/json',
      },
      timeout: options.timeoutMs,
    });

    // API key подставляется в каждый запрос
    this.client.interceptors.request.use((config) => {
      const { apiKey } = this.credentials();
      if (apiKey) {
        config.headers.set('X-Api-Key', apiKey);
      }
      return config;
    });

    // Все ошибки наружу уходят как NetworkError / RemoteRejectionError
    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        const apiError = toApiError(error);
        logger.debug('API', `Request failed: ${apiError.message}`);
        return Promise.reject(apiError);
      },
    );
  }

  private workspacePath(): string {
    const { workspaceId } = this.credentials();
    if (!workspaceId) {
      throw new ConfigurationError('Workspace ID is not configured');
    }
    return `/workspaces/${encodeURIComponent(workspaceId)}`;
  }

  private userPath(): string {
    const { userId } = this.credentials();
    if (!userId) {
      throw new ConfigurationError('User ID is not configured');
    }
    return `${this.workspacePath()}/user/${encodeURIComponent(userId)}`;
  }

  // Clients
  async getClients(): Promise<RemoteClient[]> {
    const response = await this.client.get<RemoteClient[]>(`${this.workspacePath()}/clients`);
    return response.data;
  }

  async createClient(name: string): Promise<RemoteClient> {
    const response = await this.client.post<RemoteClient>(`${this.workspacePath()}/clients`, {
      name,
      address: '',
      note: 'Auto-created by the timer bridge',
    });
    return response.data;
  }

  // Projects
  async getProjects(): Promise<RemoteProject[]> {
    const response = await this.client.get<RemoteProject[]>(`${this.workspacePath()}/projects`);
    return response.data;
  }

  async createProject(name: string, clientId: string | null): Promise<RemoteProject> {
    const response = await this.client.post<RemoteProject>(`${this.workspacePath()}/projects`, {
      name,
      clientId,
      isPublic: false,
      color: NEW_PROJECT_COLOR,
    });
    return response.data;
  }

  // Time Entries
  async getInProgressEntries(): Promise<TimeEntry[]> {
    const response = await this.client.get<TimeEntry[]>(`${this.userPath()}/time-entries`, {
      params: { 'in-progress': true },
    });
    return response.data;
  }

  async startTimeEntry(data: StartTimeEntryRequest): Promise<TimeEntry> {
    // start: null — время старта выставляет сервер
    const response = await this.client.post<TimeEntry>(`${this.workspacePath()}/time-entries`, {
      start: null,
      description: data.description,
      projectId: data.projectId,
    });
    return response.data;
  }

  async updateTimeEntry(id: string, data: UpdateTimeEntryRequest): Promise<TimeEntry> {
    const response = await this.client.put<TimeEntry>(
      `${this.workspacePath()}/time-entries/${encodeURIComponent(id)}`,
      data,
    );
    return response.data;
  }

  async getTimeEntries(query: TimeEntriesQuery): Promise<TimeEntry[]> {
    const response = await this.client.get<TimeEntry[]>(`${this.userPath()}/time-entries`, {
      params: query,
    });
    return response.data;
  }

  // User
  async getCurrentUser(): Promise<RemoteUser> {
    const response = await this.client.get<RemoteUser>('/user');
    return response.data;
  }
}
