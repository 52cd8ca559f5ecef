/**
 * 生レコードの形式判定とzodスキーマの共通部品
 */

import { z } from 'zod';
import type { RawRecord, RecordShape } from '../models/LogEntry.js';
import { ParseError } from '../utils/errors.js';

/**
 * カンマ区切り文字列（1.19以前）または文字列配列。空のトークンは除外する
 */
export const StringListSchema = z
  .union([z.array(z.string()), z.string()])
  .transform((value) =>
    (typeof value === 'string' ? value.split(',') : value)
      .map((token) => token.trim())
      .filter((token) => token !== '')
  );

/**
 * 整数、または数字のみの文字列（サーバーによって型が揺れる）
 */
export const IntLikeSchema = z.union([
  z.number().int(),
  z
    .string()
    .regex(/^-?\d+$/)
    .transform(Number),
]);

/**
 * レコードを汎用フィールドと種別固有パラメータに分割した結果
 */
export interface SplitRecord {
  shape: RecordShape;
  /** 種別固有のコンテナを取り除いた汎用フィールド */
  data: RawRecord;
  /** 種別固有パラメータ */
  params: RawRecord;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * PHPのJSONエンコーダーは空の連想配列を [] として出力する
 */
function isParamsContainer(value: unknown): value is Record<string, unknown> | [] {
  return isPlainObject(value) || (Array.isArray(value) && value.length === 0);
}

function without(record: RawRecord, keys: string[]): RawRecord {
  const copy: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!keys.includes(key)) copy[key] = value;
  }
  return Object.freeze(copy);
}

/**
 * レコードの構造から形式を判定し、パラメータコンテナを取り出す
 * 取り出したコンテナのキーは汎用フィールドには残らない
 */
export function splitRecord(record: RawRecord, type: string): SplitRecord {
  const params = record.params;
  if (isParamsContainer(params)) {
    const containers = isPlainObject(record[type]) ? ['params', type] : ['params'];
    const unwrapped: Record<string, unknown> = Array.isArray(params) ? {} : { ...params };
    return { shape: 'current', data: without(record, containers), params: Object.freeze(unwrapped) };
  }

  const nested = record[type];
  if (isPlainObject(nested)) {
    return { shape: 'legacy-nested', data: without(record, [type]), params: Object.freeze({ ...nested }) };
  }

  const flat = Object.freeze({ ...record });
  return { shape: 'legacy-flat', data: flat, params: flat };
}

/**
 * zodで値を検証し、失敗した場合は最初の問題をParseErrorとして投げる
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  logid: number | undefined
): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const field = issue?.path.map(String).join('.') || undefined;
  const where = logid === undefined ? 'Log entry' : `Log entry (${logid})`;
  const missing =
    issue?.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined;
  const message = missing
    ? `${where} has no '${field ?? 'record'}' field`
    : `${where} has an invalid '${field ?? 'record'}' field: ${issue?.message ?? 'invalid value'}`;
  throw new ParseError(message, field, logid);
}
