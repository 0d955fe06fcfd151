/**
 * VisibilityDebugLogger - Frame capture for debugging visibility issues
 *
 * Enable this while reproducing a bug; the last frame can be exported as a
 * ready-to-paste test setup.
 */

import type { Circle, Hit, LineSegment, Vector2, VisibilityReport } from "@/types";

/**
 * Debug log entry for a single frame.
 */
export interface VisibilityDebugLog {
  timestamp: number;
  source: CircleDebugInfo;
  target: CircleDebugInfo;
  obstacles: CircleDebugInfo[];
  tangents?: TangentDebugInfo[];
  visible?: boolean;
}

export interface CircleDebugInfo {
  x: number;
  y: number;
  r: number;
}

export interface TangentDebugInfo {
  start: Vector2;
  end: Vector2;
  hit?: {
    point: Vector2;
    t: number;
    obstacleIndex: number;
  };
}

export interface DebugLoggerOptions {
  /** Maximum number of frames kept */
  readonly maxLogs?: number;
  /** Minimum time between captured frames */
  readonly throttleMs?: number;
}

const PREFIX = "[VISIBILITY DEBUG]";

function circleToDebugInfo(circle: Circle): CircleDebugInfo {
  return { x: circle.center.x, y: circle.center.y, r: circle.radius };
}

function tangentToDebugInfo(tangent: LineSegment, hit: Hit | null | undefined): TangentDebugInfo {
  const info: TangentDebugInfo = { start: { ...tangent.start }, end: { ...tangent.end } };
  if (hit) {
    info.hit = { point: { ...hit.point }, t: hit.t, obstacleIndex: hit.obstacleIndex };
  }
  return info;
}

function formatCircle(c: CircleDebugInfo): string {
  return `{ center: { x: ${c.x}, y: ${c.y} }, radius: ${c.r} }`;
}

export class VisibilityDebugLoggerImpl {
  private enabled = false;
  private logs: VisibilityDebugLog[] = [];
  private lastLog: VisibilityDebugLog | null = null;
  private lastLogTime = Number.NEGATIVE_INFINITY;
  private readonly maxLogs: number;
  private readonly logThrottleMs: number;

  constructor(options: DebugLoggerOptions = {}) {
    this.maxLogs = options.maxLogs ?? 100;
    this.logThrottleMs = options.throttleMs ?? 100;
  }

  enable(): void {
    this.enabled = true;
    console.log(`${PREFIX} Logging enabled. Use VisibilityDebugLogger.dump() to see logs.`);
  }

  disable(): void {
    this.enabled = false;
    console.log(`${PREFIX} Logging disabled.`);
  }

  toggle(): void {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Capture the inputs of a frame.
   * @returns Whether the frame was captured (false when disabled or throttled)
   */
  logFrame(source: Circle, target: Circle, obstacles: readonly Circle[]): boolean {
    if (!this.enabled) return false;

    const now = Date.now();
    if (now - this.lastLogTime < this.logThrottleMs) return false;
    this.lastLogTime = now;

    const log: VisibilityDebugLog = {
      timestamp: now,
      source: circleToDebugInfo(source),
      target: circleToDebugInfo(target),
      obstacles: obstacles.map(circleToDebugInfo),
    };

    this.lastLog = log;
    this.logs.push(log);

    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    console.log(
      `${PREFIX} Captured frame #${this.logs.length} - Source: (${source.center.x.toFixed(1)}, ${source.center.y.toFixed(1)}, r=${source.radius}), Obstacles: ${obstacles.length}`
    );
    return true;
  }

  /**
   * Attach the visibility result to the last captured frame.
   */
  logReport(report: VisibilityReport): void {
    if (!this.enabled || !this.lastLog) return;

    this.lastLog.visible = report.visible;
    this.lastLog.tangents = report.tangents.map((tangent, i) =>
      tangentToDebugInfo(tangent, report.hits[i])
    );
  }

  dump(): void {
    console.log(`${PREFIX} Dumping logs...`);
    console.log("Total logs:", this.logs.length);

    for (const log of this.logs) {
      console.group(`Log @ ${new Date(log.timestamp).toISOString()}`);
      console.log("Source:", log.source);
      console.log("Target:", log.target);
      console.log("Obstacles:", log.obstacles);
      if (log.tangents) {
        console.log("Tangents:", log.tangents);
      }
      if (log.visible !== undefined) {
        console.log("Visible:", log.visible);
      }
      console.groupEnd();
    }
  }

  getLastLog(): VisibilityDebugLog | null {
    return this.lastLog;
  }

  getAllLogs(): readonly VisibilityDebugLog[] {
    return this.logs;
  }

  clear(): void {
    this.logs = [];
    this.lastLog = null;
    this.lastLogTime = Number.NEGATIVE_INFINITY;
    console.log(`${PREFIX} Logs cleared.`);
  }

  /**
   * Export last log as a test setup (for creating test cases).
   */
  exportAsTestSetup(): string {
    if (!this.lastLog) {
      return "// No log available";
    }

    const log = this.lastLog;
    const obstacleCode = log.obstacles.map((o) => `    ${formatCircle(o)},`).join("\n");
    const expected = log.visible === undefined ? "" : `\n  expectedVisible: ${log.visible},`;

    return `/**
 * Generated from debug log
 * Timestamp: ${new Date(log.timestamp).toISOString()}
 */
export const capturedFrame = {
  source: ${formatCircle(log.source)},
  target: ${formatCircle(log.target)},
  obstacles: [
${obstacleCode}
  ],${expected}
};`;
  }

  exportToConsole(): void {
    console.log(`${PREFIX} Test Setup Export:`);
    console.log(this.exportAsTestSetup());
  }
}

/**
 * Global debug logger instance.
 */
export const VisibilityDebugLogger = new VisibilityDebugLoggerImpl();

// Expose to window for easy access from browser console
if (typeof window !== "undefined") {
  (window as unknown as { VisibilityDebugLogger: VisibilityDebugLoggerImpl }).VisibilityDebugLogger =
    VisibilityDebugLogger;
}
