/**
 * agents/index.ts — Barrel export for the stateful collaborators.
 *
 * The `middleware/` directory holds page-level interactions (consent,
 * challenge widget, human-like clicks).  The `agents/` directory holds the
 * modules that outlive a single page:
 *   • Session Store   : imported cookie jar + validity
 *   • Cookie Importer : browser-extension export → session file
 *   • Challenge Solver: submit/poll client for the solving service
 */

export { SessionStore } from './sessionStore';
export type { SessionStoreOptions } from './sessionStore';

export {
  convertBrowserCookies,
  importCookies,
  mapSameSite,
  summarizeCookies,
} from './cookieImporter';
export type { ExportedCookie, ImportReport } from './cookieImporter';

export {
  ChallengeServiceError,
  ChallengeSolver,
  classifyServiceError,
  createAxiosTransport,
} from './challengeSolver';
export type {
  ChallengeSolverOptions,
  ChallengeSolving,
  SolverParams,
  SolverTransport,
} from './challengeSolver';
