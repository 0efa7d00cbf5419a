export {
  InMemoryVariableStore,
  inferType,
  type StoredVariable,
  type VariableType,
} from './in-memory-variable-store.js';
