/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';
import { ConfigurationManager } from './ConfigurationManager.js';
import type { DebugLevel } from './types.js';

const LEVEL_ORDER: Record<DebugLevel, number> = {
  debug: 0,
  log: 1,
  warn: 2,
  error: 3,
};

export type LogMessage = string | (() => string);

export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private debugInstance: Debugger;
  private _namespace: string;
  private _configManager: ConfigurationManager;
  private _enabled: boolean;
  private _level: DebugLevel;
  private boundOnConfigChange: () => void;

  /**
   * Returns the logger for `namespace`, creating it on first use.
   */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  /**
   * Unsubscribes and forgets every cached logger.
   */
  static disposeAll(): void {
    for (const logger of DebugLogger.instances.values()) {
      logger._configManager.unsubscribe(logger.boundOnConfigChange);
    }
    DebugLogger.instances.clear();
  }

  constructor(namespace: string) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    // Gating happens here, not through the DEBUG filter of `debug` itself.
    this.debugInstance.enabled = true;
    this._configManager = ConfigurationManager.getInstance();
    this._enabled = this.checkEnabled();
    this._level = this._configManager.getEffectiveConfig().level;
    this.boundOnConfigChange = () => this.onConfigChange();
    this._configManager.subscribe(this.boundOnConfigChange);
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
  }

  get level(): DebugLevel {
    return this._level;
  }

  set level(value: DebugLevel) {
    this._level = value;
  }

  get configManager(): ConfigurationManager {
    return this._configManager;
  }

  /**
   * The `debug` instance output is routed through. Exposed so tests can
   * replace its `log` function.
   */
  get output(): Debugger {
    return this.debugInstance;
  }

  log(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('log', messageOrFn, args);
  }

  debug(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('debug', messageOrFn, args);
  }

  warn(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('warn', messageOrFn, args);
  }

  error(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('error', messageOrFn, args);
  }

  private write(
    level: DebugLevel,
    messageOrFn: LogMessage,
    args: unknown[],
  ): void {
    if (!this._enabled || LEVEL_ORDER[level] < LEVEL_ORDER[this._level]) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    this.debugInstance('%s', `[${level}] ${message}`, ...args);
  }

  checkEnabled(): boolean {
    const config = this._configManager.getEffectiveConfig();
    if (!config.enabled) {
      return false;
    }

    return config.namespaces.some((pattern) =>
      this.matchesPattern(this._namespace, pattern),
    );
  }

  private matchesPattern(namespace: string, pattern: string): boolean {
    if (pattern === namespace) {
      return true;
    }

    if (pattern.includes('*')) {
      const regexPattern = pattern
        .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
        .replace(/\*/g, '.*');

      return new RegExp(`^${regexPattern}$`).test(namespace);
    }

    return false;
  }

  private onConfigChange(): void {
    this._enabled = this.checkEnabled();
    this._level = this._configManager.getEffectiveConfig().level;
  }

  dispose(): void {
    this._configManager.unsubscribe(this.boundOnConfigChange);
    if (DebugLogger.instances.get(this._namespace) === this) {
      DebugLogger.instances.delete(this._namespace);
    }
  }
}
