/**
 * Story generation providers.
 */

export {
  normalizeStory,
  parseStoryText,
  StoryFormatError,
  type GeneratedStory,
  type StoryGenerator,
  type StoryRequest,
} from "./story.js";
export { ChatCompletionsGenerator } from "./chat-completions.js";
