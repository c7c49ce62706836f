/**
 * Chat Config Schema
 *
 * Defaults for content-type resolution, image turn framing and the text
 * embedding cache flags passed to the model.
 *
 * @module config/schema/chat
 */

/** Placeholder every role template substitutes the message body into */
export const MESSAGE_PLACEHOLDER = '${MESSAGE}';

export interface ChatConfigSchema {
  /** File extensions that make a string input resolve to an image */
  imageExtensions: string[];
  /** Text embedded after image features when a template has no imageSuffix */
  imageSuffix: string;
  /** Let the model reuse its token-embedding cache for message text */
  textEmbeddingCache: boolean;
  /** Let the model reuse its token-embedding cache for template fragments around images */
  templateFragmentCache: boolean;
  /** Template used when a history is created without one (null = detect from model name) */
  defaultTemplate: string | null;
}

/** Default chat configuration */
export const DEFAULT_CHAT_CONFIG: ChatConfigSchema = {
  imageExtensions: ['.png', '.jpg', '.jpeg', '.tga', '.bmp', '.gif'],
  imageSuffix: '\n',
  textEmbeddingCache: false,
  templateFragmentCache: true,
  defaultTemplate: null,
};
