import type { OrbitRecord } from "../types";

/**
 * Metrics for a completed batch.
 */
export interface BatchMetrics {
  batchId: string;
  ruleName: string;
  startTime: number;
  endTime: number;
  duration: number; // milliseconds
  requestedOrbits: number;
  completedOrbits: number;
  classifiedOrbits: number;
  cappedOrbits: number;
  orbitsPerSecond: number;
  averageOrbitTime: number;
  longestOrbit: number;
  aborted: boolean;
}

/**
 * Active batch tracking.
 */
interface BatchSession {
  batchId: string;
  ruleName: string;
  startTime: number;
  requestedOrbits: number;
  completedOrbits: number;
  classifiedOrbits: number;
  cappedOrbits: number;
  totalOrbitTime: number;
  longestOrbit: number;
}

/**
 * Tracks timing and outcome counts of batch runs.
 *
 * Usage:
 * ```typescript
 * const monitor = new BatchMonitor();
 * const records = generateBatch(10_000, createRule("m3a1"), { monitor });
 * const metrics = monitor.getLastBatchMetrics();
 * ```
 */
export class BatchMonitor {
  private activeBatches = new Map<string, BatchSession>();
  private completedBatches: BatchMetrics[] = [];
  private maxHistorySize = 50; // Keep last 50 batches
  private sequence = 0;

  /**
   * Starts tracking a batch.
   *
   * @param ruleName - Name of the rule the batch runs
   * @param requestedOrbits - Number of start values in the batch range
   * @returns Batch ID for tracking
   */
  startBatch(ruleName: string, requestedOrbits: number): string {
    this.sequence += 1;
    const batchId = `batch-${Date.now()}-${this.sequence}`;

    this.activeBatches.set(batchId, {
      batchId,
      ruleName,
      startTime: performance.now(),
      requestedOrbits,
      completedOrbits: 0,
      classifiedOrbits: 0,
      cappedOrbits: 0,
      totalOrbitTime: 0,
      longestOrbit: 0,
    });

    return batchId;
  }

  /**
   * Records one simulated orbit.
   *
   * @param computeTime - Milliseconds spent simulating the orbit
   */
  recordOrbit(batchId: string, computeTime: number, record: OrbitRecord): void {
    const session = this.activeBatches.get(batchId);
    if (!session) {
      throw new Error(`BatchMonitor: Unknown batch ${batchId}`);
    }

    session.completedOrbits++;
    session.totalOrbitTime += computeTime;
    if (record.stopMod !== null) {
      session.classifiedOrbits++;
    }
    if (record.status === "capped") {
      session.cappedOrbits++;
    }
    session.longestOrbit = Math.max(session.longestOrbit, record.totalOrbit.length);
  }

  /**
   * Ends a batch and calculates final metrics.
   *
   * @param options.aborted - Whether the batch stopped before its range was exhausted
   */
  endBatch(batchId: string, options: { aborted?: boolean } = {}): BatchMetrics {
    const session = this.activeBatches.get(batchId);
    if (!session) {
      throw new Error(`BatchMonitor: Unknown batch ${batchId}`);
    }

    const endTime = performance.now();
    const duration = endTime - session.startTime;

    const metrics: BatchMetrics = {
      batchId,
      ruleName: session.ruleName,
      startTime: session.startTime,
      endTime,
      duration,
      requestedOrbits: session.requestedOrbits,
      completedOrbits: session.completedOrbits,
      classifiedOrbits: session.classifiedOrbits,
      cappedOrbits: session.cappedOrbits,
      orbitsPerSecond: duration > 0 ? (session.completedOrbits / duration) * 1000 : 0,
      averageOrbitTime: session.completedOrbits > 0 ? session.totalOrbitTime / session.completedOrbits : 0,
      longestOrbit: session.longestOrbit,
      aborted: options.aborted ?? false,
    };

    this.completedBatches.push(metrics);
    if (this.completedBatches.length > this.maxHistorySize) {
      this.completedBatches.shift();
    }

    this.activeBatches.delete(batchId);

    return metrics;
  }

  /**
   * Gets current progress of an active batch.
   *
   * @returns Progress percentage (0-100) or null if batch not found
   */
  getProgress(batchId: string): number | null {
    const session = this.activeBatches.get(batchId);
    if (!session) {
      return null;
    }

    return session.requestedOrbits > 0 ? (session.completedOrbits / session.requestedOrbits) * 100 : 0;
  }

  getLastBatchMetrics(): BatchMetrics | null {
    if (this.completedBatches.length === 0) {
      return null;
    }
    return this.completedBatches[this.completedBatches.length - 1];
  }

  /**
   * Gets summary statistics across all completed batches.
   */
  getStats(): {
    totalBatches: number;
    totalOrbits: number;
    averageDuration: number;
    averageOrbitsPerSecond: number;
    abortedBatches: number;
  } {
    const totalBatches = this.completedBatches.length;
    if (totalBatches === 0) {
      return {
        totalBatches: 0,
        totalOrbits: 0,
        averageDuration: 0,
        averageOrbitsPerSecond: 0,
        abortedBatches: 0,
      };
    }

    const totalDuration = this.completedBatches.reduce((sum, m) => sum + m.duration, 0);
    const totalOrbitsPerSecond = this.completedBatches.reduce((sum, m) => sum + m.orbitsPerSecond, 0);

    return {
      totalBatches,
      totalOrbits: this.completedBatches.reduce((sum, m) => sum + m.completedOrbits, 0),
      averageDuration: totalDuration / totalBatches,
      averageOrbitsPerSecond: totalOrbitsPerSecond / totalBatches,
      abortedBatches: this.completedBatches.filter((m) => m.aborted).length,
    };
  }

  getHistory(): BatchMetrics[] {
    return [...this.completedBatches];
  }

  clearHistory(): void {
    this.completedBatches = [];
  }

  /**
   * Sets the maximum number of batches to keep in history.
   */
  setMaxHistorySize(size: number): void {
    this.maxHistorySize = size;
    while (this.completedBatches.length > this.maxHistorySize) {
      this.completedBatches.shift();
    }
  }
}
