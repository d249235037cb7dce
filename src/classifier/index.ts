export {
  DEFAULT_DESTRUCTIVE_TERMS,
  createClassifier,
  isDestructive,
  tokenize,
  type DestructiveClassifier
} from './destructive.js';
