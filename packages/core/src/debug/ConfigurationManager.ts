/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  type LoadSettingsOptions,
  getProjectSettingsPath,
  getUserSettingsPath,
  readSettingsFile,
} from '../config/settings.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  type DebugSettings,
  type PartialDebugSettings,
  isDebugLevel,
} from './types.js';

const NAMESPACE_PREFIX = 'ttyinput';

/**
 * Resolves the effective debug logging settings. Layers, lowest priority
 * first: defaults, user settings, project settings, environment, command
 * line, ephemeral (runtime) overrides.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly defaultConfig: DebugSettings = {
    enabled: false,
    namespaces: [],
    level: 'log',
  };
  private userConfig: PartialDebugSettings | null = null;
  private projectConfig: PartialDebugSettings | null = null;
  private envConfig: PartialDebugSettings | null = null;
  private cliConfig: PartialDebugSettings | null = null;
  private ephemeralConfig: PartialDebugSettings | null = null;
  private mergedConfig: DebugSettings;
  private listeners: Set<() => void> = new Set();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  /**
   * Drops the singleton so the next `getInstance()` re-reads the
   * environment and settings files.
   */
  static resetInstance(): void {
    ConfigurationManager.instance = undefined;
  }

  private constructor() {
    this.mergedConfig = { ...this.defaultConfig };
    this.loadConfigurations();
  }

  loadConfigurations(options: LoadSettingsOptions = {}): void {
    this.loadEnvironmentConfig();
    this.userConfig = this.loadFileConfig(getUserSettingsPath(options.homeDir));
    this.projectConfig = this.loadFileConfig(
      getProjectSettingsPath(options.cwd),
    );
    this.mergeConfigurations();
  }

  // DEBUG only enables ttyinput namespaces; TTYINPUT_DEBUG enables whatever
  // it lists.
  private loadEnvironmentConfig(): void {
    this.envConfig = null;

    if (process.env.DEBUG) {
      const namespaces = this.parseDebugEnv(process.env.DEBUG).filter(
        (ns) => ns.startsWith(NAMESPACE_PREFIX) || ns === '*',
      );
      if (namespaces.length > 0) {
        this.envConfig = { enabled: true, namespaces };
      }
    }

    if (process.env.TTYINPUT_DEBUG) {
      this.envConfig = {
        enabled: true,
        namespaces: this.parseDebugEnv(process.env.TTYINPUT_DEBUG),
      };
    }

    const level = process.env.DEBUG_LEVEL;
    if (level && isDebugLevel(level)) {
      this.envConfig = { ...this.envConfig, level };
    }
  }

  private loadFileConfig(filePath: string): PartialDebugSettings | null {
    try {
      return readSettingsFile(filePath).debug ?? null;
    } catch (error: unknown) {
      console.warn(
        `Ignoring debug settings from ${filePath}: ${getErrorMessage(error)}`,
      );
      return null;
    }
  }

  private mergeConfigurations(): void {
    const layers = [
      this.userConfig,
      this.projectConfig,
      this.envConfig,
      this.cliConfig,
      this.ephemeralConfig,
    ];

    this.mergedConfig = layers.reduce<DebugSettings>(
      (merged, layer) => (layer ? { ...merged, ...layer } : merged),
      { ...this.defaultConfig },
    );

    this.listeners.forEach((listener) => listener());
  }

  setCliConfig(config: PartialDebugSettings): void {
    this.cliConfig = config;
    this.mergeConfigurations();
  }

  setEphemeralConfig(config: PartialDebugSettings): void {
    this.ephemeralConfig = {
      ...this.ephemeralConfig,
      ...config,
    };
    this.mergeConfigurations();
  }

  clearEphemeralConfig(): void {
    this.ephemeralConfig = null;
    this.mergeConfigurations();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }

  private parseDebugEnv(value: string): string[] {
    return value
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
}
