/**
 * Bounded scan orchestrator
 * Probes every descriptor concurrently, never more than a fixed number at once
 */

import type { EndpointDescriptor, ProbeOutcome, ScanResult } from '../types/scan.js';
import { errorMessage } from '../types/errors.js';
import { OutcomeCollector } from './outcome-collector.js';
import { PermitPool } from './permit-pool.js';
import { probeEndpoint } from './prober.js';
import type { Transport } from './transport.js';

export const DEFAULT_CONCURRENCY = 8;

/**
 * Progress notifications emitted while a scan runs
 */
export type ScanProgressEvent =
  | { type: 'probe-start'; index: number; descriptor: EndpointDescriptor; total: number }
  | { type: 'probe-complete'; index: number; outcome: ProbeOutcome; completed: number; total: number };

export interface ScanOrchestratorOptions {
  transport: Transport;
  /** Maximum probes in flight */
  concurrency?: number;
  onProgress?: (event: ScanProgressEvent) => void;
}

/**
 * Runs one probe per descriptor under a permit pool and gathers exactly
 * one outcome per descriptor. A failing probe becomes a failure outcome and
 * never affects the others.
 */
export class ScanOrchestrator {
  readonly concurrency: number;
  private readonly transport: Transport;
  private readonly onProgress?: (event: ScanProgressEvent) => void;

  constructor(options: ScanOrchestratorOptions) {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
    this.transport = options.transport;
    this.onProgress = options.onProgress;
  }

  /**
   * Scan all descriptors
   *
   * @returns One outcome per descriptor, in input order
   */
  async run(descriptors: readonly EndpointDescriptor[]): Promise<ScanResult> {
    const total = descriptors.length;
    if (total === 0) {
      return [];
    }

    const permits = new PermitPool(this.concurrency);
    const collector = new OutcomeCollector(total);

    // Dispatch everything up front; the pool decides when each probe starts
    for (const [index, descriptor] of descriptors.entries()) {
      this.runTask(index, descriptor, total, permits, collector).catch((error: unknown) => {
        collector.abort(new Error(`Scan task ${index} faulted: ${errorMessage(error)}`, { cause: error }));
      });
    }

    return collector.done;
  }

  private async runTask(
    index: number,
    descriptor: EndpointDescriptor,
    total: number,
    permits: PermitPool,
    collector: OutcomeCollector
  ): Promise<void> {
    const outcome = await permits.use(async () => {
      this.emit({ type: 'probe-start', index, descriptor, total });
      return probeEndpoint(descriptor, this.transport);
    });

    collector.submit(index, outcome);
    this.emit({ type: 'probe-complete', index, outcome, completed: collector.count, total });
  }

  private emit(event: ScanProgressEvent): void {
    if (!this.onProgress) {
      return;
    }
    try {
      this.onProgress(event);
    } catch (error) {
      // Listener faults never reach the scan tasks
      process.emitWarning(`Scan progress listener threw: ${errorMessage(error)}`);
    }
  }
}
