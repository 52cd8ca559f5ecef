import { z } from 'zod';

/**
 * ミリ秒精度の時間差
 */
export class Duration {
  constructor(public readonly milliseconds: number) {}

  static ofSeconds(seconds: number): Duration {
    return new Duration(seconds * 1000);
  }

  toSeconds(): number {
    return this.milliseconds / 1000;
  }

  equals(other: Duration): boolean {
    return this.milliseconds === other.milliseconds;
  }
}

/** タイムゾーン（Zまたはオフセット）必須のISO 8601 */
const IsoTimestampSchema = z.string().datetime({ offset: true });

const MW_TIMESTAMP = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/;

/**
 * ウィキのAPIが返すタイムスタンプ（常にUTC）
 */
export class Timestamp {
  private constructor(private readonly epochMs: number) {}

  /**
   * ISO 8601形式（"2020-01-01T00:00:00Z"）または14桁のMediaWiki形式を解析
   * タイムゾーンのないISO形式を含め、それ以外はundefinedを返す
   */
  static parse(value: string): Timestamp | undefined {
    const mw = MW_TIMESTAMP.exec(value);
    const iso = mw ? `${mw[1]}-${mw[2]}-${mw[3]}T${mw[4]}:${mw[5]}:${mw[6]}Z` : value;
    if (!IsoTimestampSchema.safeParse(iso).success) {
      return undefined;
    }
    const epochMs = Date.parse(iso);
    return Number.isNaN(epochMs) ? undefined : new Timestamp(epochMs);
  }

  static fromEpochMilliseconds(epochMs: number): Timestamp {
    return new Timestamp(epochMs);
  }

  valueOf(): number {
    return this.epochMs;
  }

  toISOString(): string {
    return new Date(this.epochMs).toISOString().replace('.000Z', 'Z');
  }

  toJSON(): string {
    return this.toISOString();
  }

  plus(duration: Duration): Timestamp {
    return new Timestamp(this.epochMs + duration.milliseconds);
  }

  /**
   * this - other
   */
  diff(other: Timestamp): Duration {
    return new Duration(this.epochMs - other.epochMs);
  }

  equals(other: Timestamp): boolean {
    return this.epochMs === other.epochMs;
  }
}
