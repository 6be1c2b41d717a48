import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { getLogger } from '../../monitoring/logger.js';
import { errorMessage } from '../errors.js';
import { PreferencesSchema, type DecisionPoint, type Preferences } from '../types.js';

const emptyPreferences = (): Preferences => ({ decisions: {}, customDecisionDefinitions: [] });

/**
 * Remembered decision-point choices plus user-registered decision points.
 * Backed by a JSON file when given a path; memory-only otherwise.
 * Call load() once at startup; every write is saved immediately.
 */
export class PreferenceStore {
  private logger = getLogger({ service: 'PreferenceStore' });
  private prefs: Preferences = emptyPreferences();

  constructor(readonly path: string | null) {}

  load(): this {
    if (!this.path || !existsSync(this.path)) {
      this.prefs = emptyPreferences();
      return this;
    }

    try {
      const parsed = PreferencesSchema.safeParse(JSON.parse(readFileSync(this.path, 'utf-8')));
      if (parsed.success) {
        this.prefs = parsed.data;
      } else {
        this.logger.warn('Preferences file has an unexpected shape; starting empty', {
          path: this.path,
          issue: parsed.error.issues[0]?.message,
        });
        this.prefs = emptyPreferences();
      }
    } catch (err) {
      this.logger.warn('Could not read preferences; starting empty', { path: this.path, error: errorMessage(err) });
      this.prefs = emptyPreferences();
    }
    return this;
  }

  getChoice(decisionName: string): string | undefined {
    return this.prefs.decisions[decisionName];
  }

  setChoice(decisionName: string, optionName: string): void {
    this.prefs.decisions[decisionName] = optionName;
    this.save();
  }

  customDefinitions(): DecisionPoint[] {
    return [...this.prefs.customDecisionDefinitions];
  }

  /** Adds or replaces (by name) a custom decision point definition. */
  putCustomDefinition(definition: DecisionPoint): void {
    this.prefs.customDecisionDefinitions = [
      ...this.prefs.customDecisionDefinitions.filter((d) => d.name !== definition.name),
      definition,
    ];
    this.save();
  }

  snapshot(): Preferences {
    return structuredClone(this.prefs);
  }

  private save(): void {
    if (!this.path) return;
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, `${JSON.stringify(this.prefs, null, 2)}\n`, 'utf-8');
    this.logger.debug('Preferences saved', { path: this.path });
  }
}
