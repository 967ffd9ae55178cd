import type { TrackerStores } from '../store';
import { CREATE_NEW, NO_CLIENT, UNSELECTED } from '../store/displayStore';
import { filterProjectsForClient, resolveSelection } from '../tracker/selection';

/**
 * Применяет выбор клиента: флаг поля "новый клиент", кэшированный clientId
 * и перепроверка выбранного проекта.
 */
export function applyClientSelection(stores: TrackerStores, clientSelection: string): void {
  const reference = stores.reference.getState();

  if (clientSelection === NO_CLIENT) {
    reference.setSelectedClientId(null);
  } else if (clientSelection !== CREATE_NEW && reference.findClient(clientSelection)) {
    reference.setSelectedClientId(clientSelection);
  }

  stores.display.getState().update({
    clientSelection,
    showNewClientField: clientSelection === CREATE_NEW,
  });

  syncProjectSelection(stores, true);
}

/**
 * Проверяет, что выбранный проект принадлежит выбранному клиенту.
 * keepCreateNew — не сбрасывать режим "новый проект", если его выбрал пользователь.
 */
export function syncProjectSelection(stores: TrackerStores, keepCreateNew: boolean): void {
  const display = stores.display.getState();

  // Клиент ещё не выбран: проект определится вместе с ним
  if (display.clientSelection === UNSELECTED) {
    display.update({ projectSelection: UNSELECTED, showNewProjectField: false, createProjectChosen: false });
    return;
  }

  const valid = filterProjectsForClient(
    stores.reference.getState().getProjects(),
    display.clientSelection,
  ).map((project) => project.id);

  const current = display.projectSelection;
  const keep = keepCreateNew && current === CREATE_NEW && display.createProjectChosen;
  const next = keep ? CREATE_NEW : resolveSelection(current, valid);

  display.update({
    projectSelection: next,
    showNewProjectField: next === CREATE_NEW,
    createProjectChosen: keep,
  });
}

/** After a client refresh: keep NONE or a listed client, otherwise first client or CREATE_NEW. */
export function resolveClientSelection(stores: TrackerStores): string {
  const current = stores.display.getState().clientSelection;
  if (current === NO_CLIENT) {
    return current;
  }
  const ids = stores.reference.getState().getClients().map((client) => client.id);
  return current === UNSELECTED ? ids[0] ?? CREATE_NEW : resolveSelection(current, ids);
}
