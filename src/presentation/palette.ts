import chalk from "chalk";

/**
 * Signal quality bands, evaluated top-down with strict thresholds
 */
export enum SignalBand {
  STRONG = "STRONG",
  GOOD = "GOOD",
  FAIR = "FAIR",
  WEAK = "WEAK",
}

/**
 * `table` distinguishes a fair band; `list` folds it into weak.
 */
export type BandingVariant = "table" | "list";

export function classifySignal(signal: number, variant: BandingVariant = "table"): SignalBand {
  if (signal > 70) {
    return SignalBand.STRONG;
  }
  if (signal > 50) {
    return SignalBand.GOOD;
  }
  if (variant === "table" && signal > 30) {
    return SignalBand.FAIR;
  }
  return SignalBand.WEAK;
}

/**
 * Colors text by signal band. Wraps a chalk instance so callers and tests can
 * choose the color level.
 */
export class Palette {
  constructor(private readonly ink: chalk.Chalk = chalk) {}

  static plain(): Palette {
    return new Palette(new chalk.Instance({ level: 0 }));
  }

  static forOutput(color: boolean): Palette {
    return color ? new Palette() : Palette.plain();
  }

  band(text: string, band: SignalBand): string {
    switch (band) {
      case SignalBand.STRONG:
        return this.ink.green(text);
      case SignalBand.GOOD:
        return this.ink.yellow(text);
      case SignalBand.FAIR:
        return this.ink.magenta(text);
      case SignalBand.WEAK:
        return this.ink.red(text);
    }
  }

  signal(text: string, signal: number, variant: BandingVariant = "table"): string {
    return this.band(text, classifySignal(signal, variant));
  }

  dim(text: string): string {
    return this.ink.dim(text);
  }
}
