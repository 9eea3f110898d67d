import {
  resolveSettings,
  SETTINGS_SECTION,
  type AdapterSettings,
} from '../config.js';
import type { DocumentUri } from '../types.js';
import { getLogger } from './logger.js';

/** Asks the client for our section, scoped to one document. */
export type ConfigurationFetcher = (
  scopeUri: DocumentUri,
  section: string,
) => Promise<unknown>;

export interface SettingsSource {
  forDocument(uri: DocumentUri): Promise<AdapterSettings>;
}

const logger = getLogger('settings');

/**
 * Per-document settings when the client can be asked for them, global
 * settings otherwise. Pulled settings are cached until the client reports a
 * configuration change.
 */
export class SettingsProvider implements SettingsSource {
  private readonly documentSettings = new Map<DocumentUri, AdapterSettings>();
  private fetcher: ConfigurationFetcher | null = null;

  public constructor(private globalSettings: AdapterSettings) {}

  public get global(): AdapterSettings {
    return this.globalSettings;
  }

  public enablePull(fetcher: ConfigurationFetcher | null): void {
    this.fetcher = fetcher;
    this.documentSettings.clear();
  }

  public get canPull(): boolean {
    return this.fetcher !== null;
  }

  /** Replaces the global settings with a client payload (our section only). */
  public updateGlobal(section: unknown): void {
    if (section !== undefined) {
      this.globalSettings = this.resolve(section, 'global');
    }
    this.documentSettings.clear();
  }

  public forget(uri: DocumentUri): void {
    this.documentSettings.delete(uri);
  }

  public async forDocument(uri: DocumentUri): Promise<AdapterSettings> {
    if (!this.fetcher) {
      return this.globalSettings;
    }

    const cached = this.documentSettings.get(uri);
    if (cached) {
      return cached;
    }

    let value: unknown;
    try {
      value = await this.fetcher(uri, SETTINGS_SECTION);
    } catch (error) {
      logger.warn(
        `workspace/configuration failed for ${uri}, using global settings: ${String(error)}`,
      );
      return this.globalSettings;
    }

    if (value === undefined || value === null) {
      return this.globalSettings;
    }

    const settings = this.resolve(value, uri);
    this.documentSettings.set(uri, settings);
    return settings;
  }

  private resolve(value: unknown, scope: string): AdapterSettings {
    const { settings, issues } = resolveSettings(value);
    for (const issue of issues) {
      logger.warn(`Ignoring invalid setting for ${scope}: ${issue}`);
    }
    return settings;
  }
}
