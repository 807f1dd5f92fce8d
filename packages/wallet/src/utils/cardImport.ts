/**
 * Card import from uploaded JSON or CSV files
 */

import { z } from 'zod';
import {
  MultiplierMapSchema,
  fail,
  formatZodIssues,
  ok,
  type CardProfile,
  type EngineResult,
} from '@cardwise/core';

const rate = z.coerce.number().nonnegative();

// Upload files use snake_case column names
const CardFileRecordSchema = z
  .object({
    card_id: z.string().trim().min(1, 'card_id is required'),
    bank: z.string().trim().min(1, 'bank is required'),
    network: z.string().trim().min(1, 'network is required'),
    reward_rate: rate,
    monthly_reward_cap: rate.default(0),
    annual_fee: rate.default(0),
    milestone_spend: rate.default(0),
    milestone_bonus: rate.default(0),
    category_multipliers: MultiplierMapSchema.default({}),
    channel_multipliers: MultiplierMapSchema.default({}),
    merchant_multipliers: MultiplierMapSchema.default({}),
  })
  .transform((record): CardProfile => ({
    cardId: record.card_id,
    bank: record.bank,
    network: record.network.toLowerCase(),
    baseRewardRate: record.reward_rate,
    monthlyRewardCap: record.monthly_reward_cap,
    annualFee: record.annual_fee,
    milestoneSpend: record.milestone_spend,
    milestoneBonus: record.milestone_bonus,
    categoryMultipliers: record.category_multipliers,
    channelMultipliers: record.channel_multipliers,
    merchantMultipliers: record.merchant_multipliers,
  }));

function parseCsvRows(content: string): readonly Record<string, string>[] {
  const lines = content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line !== '');

  if (lines.length === 0) return [];

  const [headerLine, ...dataLines] = lines;
  const headers = headerLine.split(',').map(header => header.trim());

  return dataLines.map(line => {
    const values = line.split(',').map(value => value.trim());
    return headers.reduce<Record<string, string>>((row, header, index) => {
      const value = values[index];
      return value != null && value !== '' ? { ...row, [header]: value } : row;
    }, {});
  });
}

function parseJsonRows(content: string): EngineResult<readonly unknown[]> {
  let payload: unknown;
  try {
    payload = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fail('INVALID_INPUT', 'Card file is not valid JSON', [message]);
  }

  return Array.isArray(payload)
    ? ok(payload)
    : fail('INVALID_INPUT', 'Card file must contain a JSON array of cards');
}

function validateRows(rows: readonly unknown[]): EngineResult<readonly CardProfile[]> {
  const results = rows.map(row => CardFileRecordSchema.safeParse(row));

  const issues = results.flatMap((result, index) =>
    result.success ? [] : formatZodIssues(result.error).map(issue => `row ${index + 1}: ${issue}`)
  );
  if (issues.length > 0) {
    return fail('INVALID_INPUT', 'Card file has invalid rows', issues);
  }

  const cards = results.flatMap(result => (result.success ? [result.data] : []));
  return cards.length > 0
    ? ok(cards)
    : fail('INVALID_INPUT', 'Card file contains no cards');
}

/**
 * Parse an uploaded card file; `.csv` by extension, JSON otherwise
 */
export function parseCardFile(filename: string, content: string): EngineResult<readonly CardProfile[]> {
  if (filename.toLowerCase().endsWith('.csv')) {
    return validateRows(parseCsvRows(content));
  }

  const rows = parseJsonRows(content);
  return rows.success ? validateRows(rows.data) : rows;
}
