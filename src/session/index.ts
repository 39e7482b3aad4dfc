export {
  SearchSession,
  runSearchSession,
  type SearchSessionOptions,
  type SessionCache,
  type SessionInput,
  type SessionOutcome,
  type SessionState,
  type SessionView,
} from './search_session.js';
export { keyToInput, VIEW_CHORDS, type KeyPress } from './keymap.js';
