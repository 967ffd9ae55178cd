import { createStore, type StoreApi } from 'zustand/vanilla';
import { persist, createJSONStorage, type StateStorage } from 'zustand/middleware';
import { ZodError } from 'zod';
import { defaultPreferences, preferencesSchema, type Preferences } from '../lib/config';
import { ConfigurationError } from '../lib/errors';

export interface PreferencesState {
  preferences: Preferences;
  getPreferences: () => Preferences;
  /** Validates the merged preferences; throws ConfigurationError when invalid. */
  updatePreferences: (patch: Partial<Preferences>) => void;
}

export type PreferencesStore = StoreApi<PreferencesState>;

export const PREFERENCES_STORAGE_KEY = 'tracker-preferences';

function formatZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'preferences'}: ${issue.message}`).join('; ');
}

/**
 * Настройки хранит хост (StateStorage); zustand persist сохраняет их целиком.
 */
export function createPreferencesStore(
  storage: StateStorage,
  initial: Preferences = defaultPreferences,
): PreferencesStore {
  return createStore<PreferencesState>()(
    persist(
      (set, get) => ({
        preferences: { ...initial },

        getPreferences: () => ({ ...get().preferences }),

        updatePreferences: (patch) => {
          try {
            const preferences = preferencesSchema.parse({ ...get().preferences, ...patch });
            set({ preferences });
          } catch (error) {
            if (error instanceof ZodError) {
              throw new ConfigurationError(`Invalid preferences: ${formatZodError(error)}`);
            }
            throw error;
          }
        },
      }),
      {
        name: PREFERENCES_STORAGE_KEY,
        storage: createJSONStorage(() => storage),
        partialize: (state) => ({ preferences: state.preferences }),
        // Сохранённые значения поверх текущих; битые поля отбрасываются схемой
        merge: (persisted, current) => {
          const stored =
            typeof persisted === 'object' && persisted !== null && 'preferences' in persisted
              ? persisted.preferences
              : undefined;
          const parsed = preferencesSchema.safeParse({
            ...current.preferences,
            ...(typeof stored === 'object' && stored !== null ? stored : {}),
          });
          return { ...current, preferences: parsed.success ? parsed.data : current.preferences };
        },
      },
    ),
  );
}
