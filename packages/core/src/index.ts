export {
  DEFAULT_CHAT_DEPLOYMENT,
  ENV_AZURE_OPENAI_CHAT_DEPLOYMENT,
  ENV_AZURE_OPENAI_ENDPOINT,
  ENV_AZURE_SEARCH_API_KEY,
  ENV_AZURE_SEARCH_ENDPOINT,
  ENV_AZURE_SEARCH_INDEX_NAME,
  LayeredConfigurationService,
  SETTING_DEFINITIONS,
  createConfigurationService,
  validateConfiguration
} from "./config/configuration-service.js";

export type {
  ConfigurationService,
  ConfigurationValidation,
  EnvironmentMap,
  RagConfiguration,
  RagConfigurationField,
  SettingsMap
} from "./config/configuration-service.js";

export {
  SETTINGS_KEY_SEPARATOR,
  SettingsFileError,
  flattenSettings,
  parseSettingsDocument
} from "./config/settings-file.js";

export { Citation, UNKNOWN_DOCUMENT_TITLE } from "./citations/citation.js";
export type { CitationInput } from "./citations/citation.js";

export {
  CITATIONS_HEADING,
  ChatCompletionCitationParser,
  DEFAULT_CONTENT_PREVIEW_CHARS,
  formatCitation,
  formatCitations,
  parseCitations,
  truncateContent
} from "./citations/citation-parser.js";

export type { CitationParser } from "./citations/citation-parser.js";

export { buildAzureSearchDataSource, buildSearchAuthentication } from "./chat/data-source.js";
export { extractAnswerText, readFirstChoiceMessage } from "./chat/response.js";

export type {
  AzureSearchAuthentication,
  AzureSearchDataSource,
  ChatDataSource,
  ChatMessage,
  ChatRequest,
  ChatRole,
  ChatTransport
} from "./chat/types.js";
