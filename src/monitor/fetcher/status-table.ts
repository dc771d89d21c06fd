/**
 * Status code lookup
 *
 * Provider status codes are classification data supplied by configuration:
 * exact codes win over bands, and bands are checked in declaration order.
 */

import { StatusBand, StatusTableConfig } from '../types';

export class StatusCodeTable {
  private readonly bands: StatusBand[];
  private readonly codes: Map<number, string> = new Map();

  constructor(config: StatusTableConfig = { bands: [], codes: {} }) {
    this.bands = [...config.bands];
    for (const [code, description] of Object.entries(config.codes)) {
      const parsed = Number(code);
      if (Number.isInteger(parsed)) {
        this.codes.set(parsed, description);
      }
    }
  }

  describe(code: number): string {
    const exact = this.codes.get(code);
    if (exact !== undefined) {
      return exact;
    }

    const band = this.bands.find(b => code >= b.min && code <= b.max);
    return band ? band.description : `Unknown status (${code})`;
  }

  /**
   * Whether the code is covered by an exact entry or a band
   */
  isKnown(code: number): boolean {
    return this.codes.has(code) || this.bands.some(b => code >= b.min && code <= b.max);
  }

  get size(): number {
    return this.codes.size + this.bands.length;
  }
}
