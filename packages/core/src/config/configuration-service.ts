export type SettingsMap = Record<string, string | undefined>;

export type EnvironmentMap = Record<string, string | undefined>;

export interface RagConfiguration {
  readonly endpoint: string;
  readonly chatDeploymentName: string;
  readonly searchEndpoint: string;
  readonly searchIndexName: string;
  readonly searchApiKey: string;
}

export type RagConfigurationField = keyof RagConfiguration;

export type ConfigurationValidation = {
  isValid: boolean;
  missingSettings: string[];
};

export interface ConfigurationService {
  load(): RagConfiguration;
  validate(config: RagConfiguration): ConfigurationValidation;
}

type SettingDefinition = {
  settingsKey: string;
  envKey: string;
  defaultValue: string;
};

export const DEFAULT_CHAT_DEPLOYMENT = "gpt-4";

export const ENV_AZURE_OPENAI_ENDPOINT = "AZURE_OPENAI_ENDPOINT";
export const ENV_AZURE_OPENAI_CHAT_DEPLOYMENT = "AZURE_OPENAI_CHAT_DEPLOYMENT";
export const ENV_AZURE_SEARCH_ENDPOINT = "AZURE_SEARCH_ENDPOINT";
export const ENV_AZURE_SEARCH_INDEX_NAME = "AZURE_SEARCH_INDEX_NAME";
export const ENV_AZURE_SEARCH_API_KEY = "AZURE_SEARCH_API_KEY";

export const SETTING_DEFINITIONS: Readonly<Record<RagConfigurationField, SettingDefinition>> = {
  endpoint: {
    settingsKey: "AzureOpenAI:Endpoint",
    envKey: ENV_AZURE_OPENAI_ENDPOINT,
    defaultValue: ""
  },
  chatDeploymentName: {
    settingsKey: "AzureOpenAI:ChatDeployment",
    envKey: ENV_AZURE_OPENAI_CHAT_DEPLOYMENT,
    defaultValue: DEFAULT_CHAT_DEPLOYMENT
  },
  searchEndpoint: {
    settingsKey: "AzureSearch:Endpoint",
    envKey: ENV_AZURE_SEARCH_ENDPOINT,
    defaultValue: ""
  },
  searchIndexName: {
    settingsKey: "AzureSearch:IndexName",
    envKey: ENV_AZURE_SEARCH_INDEX_NAME,
    defaultValue: ""
  },
  searchApiKey: {
    settingsKey: "AzureSearch:ApiKey",
    envKey: ENV_AZURE_SEARCH_API_KEY,
    defaultValue: ""
  }
};

// Checked in this order; the env key is what gets reported.
const REQUIRED_FIELDS: readonly RagConfigurationField[] = ["endpoint", "searchEndpoint", "searchIndexName"];

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}

export function validateConfiguration(config: RagConfiguration): ConfigurationValidation {
  const missingSettings: string[] = [];

  for (const field of REQUIRED_FIELDS) {
    if (!nonEmpty(config[field])) {
      missingSettings.push(SETTING_DEFINITIONS[field].envKey);
    }
  }

  return {
    isValid: missingSettings.length === 0,
    missingSettings
  };
}

/**
 * Resolves each field on its own: an explicit settings override first, then the
 * environment, then the field default. A settings map that only carries some keys
 * leaves the rest to the environment.
 */
export class LayeredConfigurationService implements ConfigurationService {
  private readonly settings: SettingsMap;
  private readonly env: EnvironmentMap;

  constructor(deps: { settings?: SettingsMap; env?: EnvironmentMap } = {}) {
    this.settings = deps.settings ?? {};
    this.env = deps.env ?? process.env;
  }

  load(): RagConfiguration {
    return {
      endpoint: this.resolve("endpoint"),
      chatDeploymentName: this.resolve("chatDeploymentName"),
      searchEndpoint: this.resolve("searchEndpoint"),
      searchIndexName: this.resolve("searchIndexName"),
      searchApiKey: this.resolve("searchApiKey")
    };
  }

  validate(config: RagConfiguration): ConfigurationValidation {
    return validateConfiguration(config);
  }

  private resolve(field: RagConfigurationField): string {
    const definition = SETTING_DEFINITIONS[field];
    return (
      nonEmpty(this.settings[definition.settingsKey]) ??
      nonEmpty(this.env[definition.envKey]) ??
      definition.defaultValue
    );
  }
}

export function createConfigurationService(deps?: {
  settings?: SettingsMap;
  env?: EnvironmentMap;
}): ConfigurationService {
  return new LayeredConfigurationService(deps);
}
