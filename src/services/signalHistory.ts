import { Palette } from "../presentation/palette";

export const DEFAULT_HISTORY_DEPTH = 10;

const SPARK_GLYPHS = ["▁", "▂", "▃", "▄", "▅", "▆", "▇", "█"];

/**
 * Map a 0-100 signal percentage to one of the eight block glyphs
 */
export function sparkGlyph(signal: number): string {
  const level = Math.floor((signal * SPARK_GLYPHS.length) / 100);
  const clamped = Math.max(0, Math.min(SPARK_GLYPHS.length - 1, level));
  return SPARK_GLYPHS[clamped];
}

/**
 * Per access point record of the most recent signal readings.
 *
 * Each hardware address keeps at most `capacity` samples, oldest first; once
 * full, recording a new sample evicts the oldest one. Addresses are never
 * forgotten for the lifetime of the instance.
 */
export class SignalHistory {
  private readonly samples: Map<string, number[]> = new Map();
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_HISTORY_DEPTH) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  record(hardwareAddress: string, signal: number): void {
    let sequence = this.samples.get(hardwareAddress);
    if (!sequence) {
      sequence = [];
      this.samples.set(hardwareAddress, sequence);
    }

    sequence.push(signal);
    while (sequence.length > this.capacity) {
      sequence.shift();
    }
  }

  get(hardwareAddress: string): number[] {
    return [...(this.samples.get(hardwareAddress) ?? [])];
  }

  get size(): number {
    return this.samples.size;
  }

  /**
   * Sparkline of the stored samples, always `capacity` glyphs wide; unfilled
   * slots are blank so the line grows left to right.
   */
  render(hardwareAddress: string, palette: Palette = Palette.plain()): string {
    const sequence = this.samples.get(hardwareAddress) ?? [];
    const glyphs = sequence.map((signal) => palette.signal(sparkGlyph(signal), signal));
    return glyphs.join("") + " ".repeat(this.capacity - sequence.length);
  }
}
