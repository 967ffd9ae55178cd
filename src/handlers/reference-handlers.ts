import type { ResultHandler } from './types';
import { applyClientSelection, resolveClientSelection, syncProjectSelection } from './selection-sync';

export const handleClientsFetched: ResultHandler<'clientsFetched'> = (clients, { stores }) => {
  stores.reference.getState().setClients(clients);
  applyClientSelection(stores, resolveClientSelection(stores));
};

export const handleProjectsFetched: ResultHandler<'projectsFetched'> = (projects, { stores }) => {
  stores.reference.getState().setProjects(projects);
  syncProjectSelection(stores, false);
};

// Список клиентов не трогаем: обновление — решение follow-up
export const handleClientCreated: ResultHandler<'clientCreated'> = (client, { stores }) => {
  stores.reference.getState().setSelectedClientId(client.id);
  stores.display.getState().setStatus(`Client '${client.name}' created`);
};

export const handleProjectCreated: ResultHandler<'projectCreated'> = (project, { stores }) => {
  stores.display.getState().setStatus(`Project '${project.name}' created`);
};
