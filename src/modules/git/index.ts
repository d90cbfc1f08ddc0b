export { GitClientImpl, createGitClient } from './git-client.js'
export type { GitClient } from './git-client.js'
