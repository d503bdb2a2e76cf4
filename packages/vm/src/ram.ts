import type { MemoryEntry, RAM } from '@mipsim/types'
import * as _ from 'radash'

/**
 * Sparse machine memory
 *
 * Maps byte addresses to 32-bit words. Addresses never written read as
 * zero and no alignment is enforced, so overlapping word addresses are
 * independent entries.
 */
export class MachineRAM implements RAM {
  private readonly memoryData: Map<number, number> = new Map()

  read(address: number): number {
    return this.memoryData.get(address) ?? 0
  }

  write(address: number, value: number): void {
    this.memoryData.set(address, value >>> 0)
  }

  entries(): MemoryEntry[] {
    const nonZero: MemoryEntry[] = []
    for (const [address, value] of this.memoryData) {
      if (value !== 0) {
        nonZero.push({ address, value })
      }
    }
    return _.sort(nonZero, (entry) => entry.address)
  }
}
