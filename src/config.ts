import dotenv from 'dotenv';
import path from 'node:path';
import { DEFAULT_SPAN, isSpanInBounds } from './domain/governance/governanceTypes.js';

dotenv.config();

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

const parseSpan = (input: string | undefined): number => {
  const span = parseNumber(input, DEFAULT_SPAN);
  return isSpanInBounds(span) ? span : DEFAULT_SPAN;
};

export const config = {
  app: {
    name: 'initiative-ledger',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
  },
  paths: {
    stateFile: process.env.STATE_FILE ?? path.resolve(process.cwd(), 'data', 'ledger.json'),
    logFile: process.env.LOG_FILE ?? path.resolve(process.cwd(), 'data', 'events.ndjson'),
  },
  ledger: {
    guardianId: process.env.GUARDIAN_ID?.trim() || 'guardian',
    defaultSpan: parseSpan(process.env.DEFAULT_DELIBERATION_SPAN),
  },
};

export type AppConfig = typeof config;
