import type { ConversionStatePort } from '@cubesheet/core';

/** Remembers, for the lifetime of one watch session, which report versions were converted. */
export class MemoryConversionState implements ConversionStatePort {
  private readonly mtimes = new Map<string, number>();

  async getLastConvertedMtime(id: string): Promise<number | undefined> {
    return this.mtimes.get(id);
  }

  async setLastConvertedMtime(id: string, mtime: number): Promise<void> {
    this.mtimes.set(id, mtime);
  }
}
