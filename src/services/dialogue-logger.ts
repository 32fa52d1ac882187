/**
 * Dialogue Logger Service
 *
 * Structured logging for the dialogue runtime.
 * Components emit typed events, the logger handles all formatting.
 */

// ============================================================================
// Structured Log Events
// ============================================================================

export type DialogueLogEvent =
  | { type: 'state'; from: string; to: string; trigger: string }
  | { type: 'user'; content: string }
  | { type: 'assistant'; content: string; interrupted?: boolean }
  | { type: 'partial'; content: string }
  | { type: 'transport'; message: string }
  | { type: 'reconnect'; attempt: number; delayMs: number }
  | { type: 'protocol_violation'; message: string }
  | { type: 'info'; message: string }
  | { type: 'warning'; message: string }
  | { type: 'error'; message: string };

export type LogSink = (line: string) => void;

// ============================================================================
// Logger Implementation
// ============================================================================

/**
 * Formats and displays structured dialogue log events.
 * All formatting (colors, icons, layout) is centralized here.
 */
export class DialogueLogger {
  private static readonly COLORS = {
    reset: '\x1b[0m',
    dim: '\x1b[2m',
    cyan: '\x1b[36m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    blue: '\x1b[34m',
    red: '\x1b[31m',
  };

  private static readonly ICONS = {
    user: '👤',
    assistant: '💬',
    transport: '⇄',
    warning: '⚠',
    error: '✗',
    arrow: '→',
  };

  private enabled: boolean;
  private verbose: boolean;
  private sink: LogSink;

  constructor(options: { enabled?: boolean; verbose?: boolean; sink?: LogSink } = {}) {
    this.enabled = options.enabled ?? true;
    this.verbose = options.verbose ?? false;
    this.sink = options.sink ?? ((line) => console.log(line));
  }

  /**
   * Log a structured event
   */
  log(event: DialogueLogEvent): void {
    if (!this.enabled) return;

    const { COLORS: C, ICONS } = DialogueLogger;

    switch (event.type) {
      case 'state':
        this.sink(
          `${C.dim}[state]${C.reset} ${event.from} ${ICONS.arrow} ${C.cyan}${event.to}${C.reset} ${C.dim}(${event.trigger})${C.reset}`
        );
        break;

      case 'user':
        this.sink(`${ICONS.user} ${C.yellow}USER${C.reset}: ${event.content}`);
        break;

      case 'assistant': {
        const suffix = event.interrupted ? ` ${C.dim}(interrupted)${C.reset}` : '';
        this.sink(`${ICONS.assistant} ${C.green}ASSISTANT${C.reset}: ${event.content}${suffix}`);
        break;
      }

      case 'partial':
        // Partials arrive many times per second
        if (this.verbose) {
          this.sink(`${C.dim}… ${event.content}${C.reset}`);
        }
        break;

      case 'transport':
        this.sink(`${C.dim}${ICONS.transport} ${event.message}${C.reset}`);
        break;

      case 'reconnect':
        this.sink(
          `${C.blue}${ICONS.transport} reconnecting${C.reset} (attempt ${event.attempt}, in ${event.delayMs}ms)`
        );
        break;

      case 'protocol_violation':
        this.sink(`${C.magenta}${ICONS.warning} PROTOCOL${C.reset}: ${event.message}`);
        break;

      case 'info':
        this.sink(event.message);
        break;

      case 'warning':
        this.sink(`${C.yellow}${ICONS.warning} ${event.message}${C.reset}`);
        break;

      case 'error':
        this.sink(`${ICONS.error} ${C.red}ERROR${C.reset}: ${event.message}`);
        break;
    }
  }

  /**
   * Enable or disable logging
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }
}

// ============================================================================
// Shared instance for convenience
// ============================================================================

let defaultLogger: DialogueLogger | null = null;

/**
 * Get the default logger instance (creates one if needed)
 */
export function getDefaultLogger(): DialogueLogger {
  if (!defaultLogger) {
    defaultLogger = new DialogueLogger();
  }
  return defaultLogger;
}

/** Logger that drops everything, for tests and embedding */
export function createSilentLogger(): DialogueLogger {
  return new DialogueLogger({ enabled: false });
}
