import { DEFAULT_SPAN, LedgerState } from '../../domain/governance/governanceTypes.js';

export const createDefaultState = (standardDeliberationSpan: number = DEFAULT_SPAN): LedgerState => ({
  initiatives: [],
  participation: {},
  totalInitiatives: 0,
  standardDeliberationSpan,
});
