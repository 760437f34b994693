/**
 * Resource Monitor
 * Memory sampling for the batch memory budget
 */

export interface ResourceMonitor {
  /**
   * Current memory use in megabytes
   */
  sampleMemoryMb(): number;
}

const BYTES_PER_MB = 1024 * 1024;

/**
 * Resident set size of this process
 */
export class ProcessResourceMonitor implements ResourceMonitor {
  sampleMemoryMb(): number {
    return process.memoryUsage().rss / BYTES_PER_MB;
  }
}
