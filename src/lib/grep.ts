export {
  grepSearch,
  type GrepSearchOptions,
  search,
} from './grep/grep-search.js';
export { compilePattern } from './grep/pattern.js';
export { formatCapWarning } from './grep/result.js';
export {
  createSandboxResolver,
  type SandboxPathResolver,
} from './sandbox/resolver.js';
