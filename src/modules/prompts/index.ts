export {
  createPromptLibrary,
  renderTemplate,
  PromptLibraryImpl,
  DEFAULT_PROMPTS_DIR,
} from './prompt-library.js'
export type { PromptLibrary, PromptName, PromptVars } from './prompt-library.js'
