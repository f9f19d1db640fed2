export { type RepositoryStore, SqliteRepositoryStore } from './store'
export {
  RepositoriesFileError,
  interpolateEnvVars,
  loadRepositoriesFile,
  seedRepositories,
} from './loader'
