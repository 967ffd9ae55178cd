import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { StateStorage } from 'zustand/middleware';
import { logger } from '../lib/logger';
import type { DocumentFields } from './types';

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((item) => typeof item === 'string')
  );
}

/**
 * Плоский JSON-файл "ключ → строка". Файл читается один раз,
 * каждая запись сохраняет его целиком.
 */
export class JsonFileStore {
  private values: Record<string, string> | null = null;

  constructor(private readonly path: string) {}

  private load(): Record<string, string> {
    if (this.values) {
      return this.values;
    }
    let loaded: Record<string, string> = {};
    if (existsSync(this.path)) {
      try {
        const parsed: unknown = JSON.parse(readFileSync(this.path, 'utf8'));
        if (isStringRecord(parsed)) {
          loaded = parsed;
        } else {
          logger.warn('STORAGE', `Ignoring malformed file ${this.path}`);
        }
      } catch (error) {
        logger.warn('STORAGE', `Failed to read ${this.path}`, error);
      }
    }
    this.values = loaded;
    return loaded;
  }

  private flush(values: Record<string, string>): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, JSON.stringify(values, null, 2), 'utf8');
  }

  get(key: string): string | undefined {
    return this.load()[key];
  }

  set(key: string, value: string): void {
    const values = { ...this.load(), [key]: value };
    this.values = values;
    this.flush(values);
  }

  remove(key: string): void {
    const rest = { ...this.load() };
    delete rest[key];
    this.values = rest;
    this.flush(rest);
  }
}

/** zustand persist поверх файла. */
export function createFileStateStorage(path: string): StateStorage {
  const file = new JsonFileStore(path);
  return {
    getItem: (name) => file.get(name) ?? null,
    setItem: (name, value) => file.set(name, value),
    removeItem: (name) => file.remove(name),
  };
}

/** Custom fields of a document stored beside it as JSON. */
export function createFileDocument(path: string): DocumentFields {
  const file = new JsonFileStore(path);
  return {
    get: (key) => file.get(key),
    set: (key, value) => file.set(key, value),
  };
}
