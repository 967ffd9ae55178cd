/**
 * PRODUCTION: Терминальный хост трекера
 *
 * - Настройки: .env / переменные окружения поверх сохранённых в data-dir
 * - Поле документа (описание задачи) хранится в JSON рядом с настройками
 * - Строка статуса печатается при каждом изменении
 */

import { createInterface } from 'node:readline';
import { join } from 'node:path';
import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { createFileDocument, createFileStateStorage } from './host/file-storage';
import { NodeScheduler } from './host/node-scheduler';
import type { TrackerHost } from './host/types';
import { readEnvOverrides, type Preferences } from './lib/config';
import { TrackerError } from './lib/errors';
import { defaultLogLevel, isLogLevel, logger } from './lib/logger';
import { initSentry } from './lib/sentry';
import { createTracker } from './tracker/tracker';
import type { ActionResult } from './tracker/controller';
import { clientOptions, projectOptions, type SelectionOption } from './tracker/selection';

interface CliOptions {
  dataDir: string;
  document?: string;
  sentryDsn?: string;
  logLevel?: string;
}

const HELP = `Commands:
  start | stop | check | status-project | credentials
  clients | projects                 refresh reference lists
  list                               show selectable clients and projects
  client <id|NONE|CREATE_NEW>        select client
  project <id|CREATE_NEW>            select project
  task <text>                        set task description
  new-client <name> | new-project <name>
  set <apiKey|workspaceId|userId|hourlyRate> <value>
  show | save | help | quit`;

type SettableKey = Extract<keyof Preferences, 'apiKey' | 'workspaceId' | 'userId' | 'hourlyRate'>;

const SETTABLE: ReadonlyArray<SettableKey> = ['apiKey', 'workspaceId', 'userId', 'hourlyRate'];

function isSettable(key: string): key is SettableKey {
  return SETTABLE.some((candidate) => candidate === key);
}

function printOptions(title: string, options: SelectionOption[], selected: string): void {
  console.log(title);
  options.forEach((option) => {
    const marker = option.id === selected ? '*' : ' ';
    console.log(`${marker} ${option.id.padEnd(14)} ${option.label}`);
  });
}

function report(result: ActionResult): void {
  if (!result.ok) {
    console.log(`! ${result.reason}`);
  }
}

function main(): void {
  loadDotenv();

  const program = new Command()
    .name('clockify-timer-bridge')
    .description('Terminal host for the Clockify time tracker')
    .option('-d, --data-dir <dir>', 'Directory for stored preferences', '.clockify-tracker')
    .option('--document <file>', 'Document whose task description is kept')
    .option('--sentry-dsn <dsn>', 'Sentry DSN (defaults to SENTRY_DSN)')
    .option('--log-level <level>', 'debug | info | warn | error (defaults to LOG_LEVEL)')
    .parse();
  const options = program.opts<CliOptions>();

  // LOG_LEVEL мог прийти из .env уже после создания логгера
  if (options.logLevel === undefined) {
    logger.setLevel(defaultLogLevel());
  } else if (isLogLevel(options.logLevel)) {
    logger.setLevel(options.logLevel);
  } else {
    program.error(`Unknown log level: ${options.logLevel}`);
  }

  initSentry({
    dsn: options.sentryDsn ?? process.env.SENTRY_DSN,
    environment: process.env.NODE_ENV,
  });

  let pendingReset = false;
  let lastStatus = '';

  const host: TrackerHost = {
    scheduler: new NodeScheduler(),
    refresh: {
      requestRefresh: () => {
        const status = tracker.stores.display.getState().status;
        if (status && status !== lastStatus) {
          lastStatus = status;
          console.log(status);
        }
      },
    },
    confirmation: {
      requestTimerReset: (message) => {
        pendingReset = true;
        console.log(`${message} [yes/no]`);
      },
    },
    document: createFileDocument(options.document ?? join(options.dataDir, 'document.json')),
  };

  const tracker = createTracker({
    host,
    storage: createFileStateStorage(join(options.dataDir, 'preferences.json')),
    overrides: readEnvOverrides(),
  });

  const { controller } = tracker;
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  const execute = (line: string): boolean => {
    const [command = '', ...rest] = line.trim().split(/\s+/);
    const argument = line.trim().slice(command.length).trim();

    if (pendingReset && (command === 'yes' || command === 'no')) {
      pendingReset = false;
      controller.acknowledgeReset(command === 'yes');
      return true;
    }

    switch (command) {
      case '':
        return true;
      case 'start':
        report(controller.startTimer());
        return true;
      case 'stop':
        report(controller.stopTimer());
        return true;
      case 'check':
        report(controller.checkTimer());
        return true;
      case 'status-project':
        report(controller.checkProjectStatus());
        return true;
      case 'credentials':
        report(controller.checkCredentials());
        return true;
      case 'clients':
        report(controller.refreshClients());
        return true;
      case 'projects':
        report(controller.refreshProjects());
        return true;
      case 'list': {
        const reference = tracker.stores.reference.getState();
        const display = tracker.stores.display.getState();
        printOptions('Clients:', clientOptions(reference.getClients()), display.clientSelection);
        printOptions(
          'Projects:',
          projectOptions(reference.getProjects(), display.clientSelection),
          display.projectSelection,
        );
        return true;
      }
      case 'client':
        controller.selectClient(argument);
        return true;
      case 'project':
        controller.selectProject(argument);
        return true;
      case 'task':
        controller.setTaskDescription(argument);
        return true;
      case 'new-client':
        controller.setNewClientName(argument);
        return true;
      case 'new-project':
        controller.setNewProjectName(argument);
        return true;
      case 'set': {
        const [key = '', ...valueParts] = rest;
        if (!isSettable(key)) {
          console.log(`! Unknown setting: ${key}`);
          return true;
        }
        const value = valueParts.join(' ');
        const preferences = tracker.stores.preferences.getState();
        switch (key) {
          case 'hourlyRate':
            preferences.updatePreferences({ hourlyRate: Number(value) });
            break;
          case 'apiKey':
            preferences.updatePreferences({ apiKey: value });
            break;
          case 'workspaceId':
            preferences.updatePreferences({ workspaceId: value });
            break;
          case 'userId':
            preferences.updatePreferences({ userId: value });
            break;
        }
        return true;
      }
      case 'show': {
        const topbar = tracker.renderTopbar();
        if (topbar) {
          console.log(topbar);
        }
        for (const section of tracker.renderPanel()) {
          if (section.title) {
            console.log(section.title);
          }
          section.lines.forEach((text) => console.log(text));
        }
        return true;
      }
      case 'save':
        tracker.onBeforeSave();
        return true;
      case 'help':
        console.log(HELP);
        return true;
      case 'quit':
      case 'exit':
        return false;
      default:
        console.log(`! Unknown command: ${command}`);
        return true;
    }
  };

  rl.on('line', (line) => {
    try {
      if (!execute(line)) {
        rl.close();
      }
    } catch (error) {
      if (error instanceof TrackerError) {
        console.log(`! ${error.message}`);
      } else {
        logger.logError('CLI', error, 'Command failed');
      }
    }
  });

  rl.on('close', () => {
    tracker.onBeforeSave();
    tracker.unregister();
  });

  tracker.register();
  console.log(HELP);
}

main();
