export {
  GitSyncEngine,
  createSpawnRunner,
  workingPath,
  type GitRunOptions,
  type GitRunResult,
  type GitRunner,
  type GitSyncEngineConfig,
  type SyncEngine,
} from './git'
export { GitSyncError, classifyGitError, lastErrorLine } from './git-errors'
export {
  createCredentialResolver,
  toInvocationAuth,
  type CredentialOptions,
  type CredentialResolver,
  type GitCredentials,
} from './credentials'
