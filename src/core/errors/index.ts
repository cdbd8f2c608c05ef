export {
  LemmaError,
  InvalidInputError,
  InvalidBudgetError,
  ErrorCode,
  isLemmaError,
  wrapError,
} from './LemmaError';
