/**
 * Debug logging for the BDD manager and its collaborators.
 * Controlled by environment variables:
 * - DEBUG_ROBDD=true to enable debug logging
 * - DEBUG_ROBDD_LEVEL=TRACE|DEBUG|INFO (default: DEBUG)
 * - DEBUG_ROBDD_FILTER=table,apply,... (comma-separated components)
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
}

export enum LogComponent {
  TABLE = 'TABLE',
  MAKE = 'MAKE',
  APPLY = 'APPLY',
  PARSER = 'PARSER',
  MANAGER = 'MANAGER',
  EXPORT = 'EXPORT',
  BATCH = 'BATCH',
}

function parseLevel(levelStr: string): LogLevel {
  switch (levelStr.toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'INFO':
      return LogLevel.INFO;
    default:
      return LogLevel.DEBUG;
  }
}

export class DebugLogger {
  private enabled: boolean;
  private level: LogLevel;
  private componentFilter: Set<string> | null;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.enabled = env.DEBUG_ROBDD === 'true';
    this.level = parseLevel(env.DEBUG_ROBDD_LEVEL || 'DEBUG');

    const filterStr = env.DEBUG_ROBDD_FILTER;
    if (filterStr) {
      this.componentFilter = new Set(
        filterStr.split(',').map((s) => s.trim().toUpperCase())
      );
    } else {
      this.componentFilter = null; // null means log all components
    }
  }

  isEnabled(level: LogLevel, component: LogComponent): boolean {
    if (!this.enabled) return false;
    if (level < this.level) return false;
    if (this.componentFilter && !this.componentFilter.has(component))
      return false;
    return true;
  }

  formatMessage(
    level: LogLevel,
    component: LogComponent,
    message: string
  ): string {
    const timestamp = new Date().toISOString();
    const levelStr = LogLevel[level];
    return `[${timestamp}] [${levelStr}] [${component}] ${message}`;
  }

  trace(component: LogComponent, message: string): void {
    this.log(LogLevel.TRACE, component, message);
  }

  debug(component: LogComponent, message: string): void {
    this.log(LogLevel.DEBUG, component, message);
  }

  info(component: LogComponent, message: string): void {
    this.log(LogLevel.INFO, component, message);
  }

  // Utility method to log a node reference, rendering it only when enabled
  logNode(
    component: LogComponent,
    level: LogLevel,
    prefix: string,
    ref: number,
    renderFn?: () => string
  ): void {
    if (!this.isEnabled(level, component)) return;

    let message = `${prefix} #${ref}`;
    if (renderFn) {
      message += `: ${renderFn()}`;
    }

    this.log(level, component, message);
  }

  private log(level: LogLevel, component: LogComponent, message: string): void {
    if (this.isEnabled(level, component)) {
      console.log(this.formatMessage(level, component, message));
    }
  }
}

// Singleton instance
export const debugLogger = new DebugLogger();

