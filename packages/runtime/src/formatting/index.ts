export { formatPolicySetText, DEFAULT_MAX_POLICIES, type RenderOptions } from './text.js';
export { formatPolicySetMarkdown } from './markdown.js';
