import { ConfigError, ValidationError } from '../../utils/errors';
import logger from '../../utils/logger';
import { Result, err, ok } from '../../utils/result';
import { validateConfig } from './ConfigValidator';
import { AlertRule, ConfigVersion } from './types';

/**
 * Holds every accepted configuration version. A document is either accepted
 * whole or rejected whole; a rejected document leaves the current version in
 * place.
 */
export class RuleConfigStore {
  private versions: ConfigVersion[] = [];
  private lastWarnings: ValidationError[] = [];

  /**
   * Validate `document` and, if it passes, store it as the next version.
   */
  load(document: unknown): Result<ConfigVersion, ConfigError> {
    const result = validateConfig(document);
    this.lastWarnings = result.warnings;

    for (const warning of result.warnings) {
      logger.warn({ field: warning.field }, warning.message);
    }

    if (!result.valid || !result.config) {
      logger.error(
        { issues: result.errors.map(e => ({ field: e.field, message: e.message })) },
        'configuration rejected',
      );
      return err(new ConfigError(result.errors));
    }

    const version: ConfigVersion = Object.freeze({
      ...result.config,
      rules: result.config.rules.map(rule => Object.freeze({ ...rule, actionGroupRefs: Object.freeze([...rule.actionGroupRefs]) })),
      version: this.versions.length + 1,
      loadedAt: new Date().toISOString(),
    });

    this.versions.push(version);
    logger.info(
      { version: version.version, rules: version.rules.length, actionGroups: version.actionGroups.length },
      'configuration loaded',
    );

    return ok(version);
  }

  /**
   * Parse JSON text and load it. Unparseable text is a ConfigError with a
   * single issue at the document root.
   */
  loadText(text: string): Result<ConfigVersion, ConfigError> {
    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err(new ConfigError([new ValidationError(`Invalid JSON: ${message}`, '')]));
    }
    return this.load(document);
  }

  current(): ConfigVersion | null {
    return this.versions[this.versions.length - 1] ?? null;
  }

  getVersion(version: number): ConfigVersion | null {
    return this.versions[version - 1] ?? null;
  }

  listVersions(): ConfigVersion[] {
    return [...this.versions];
  }

  getRule(ruleId: string): AlertRule | null {
    return this.current()?.rules.find(rule => rule.id === ruleId) ?? null;
  }

  /** Warnings raised by the most recent load attempt. */
  getLastWarnings(): ValidationError[] {
    return [...this.lastWarnings];
  }
}
