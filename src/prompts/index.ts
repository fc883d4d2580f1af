/**
 * Newsroom prompt: loading and kernel substitution.
 */

export {
  createPrompt,
  loadPrompt,
  promptDigest,
  PromptLoadError,
  KERNEL_PLACEHOLDER,
  type FixedPrompt,
} from "./loader.js";
export { fillPrompt, renderKernel, KERNEL_AUTHOR_LIMIT, type KernelInput } from "./kernel.js";
