import type { RagConfiguration } from "../config/configuration-service.js";
import type { AzureSearchAuthentication, AzureSearchDataSource } from "./types.js";

export function buildSearchAuthentication(searchApiKey: string): AzureSearchAuthentication {
  if (searchApiKey.length > 0) {
    return { type: "api_key", key: searchApiKey };
  }
  return { type: "system_assigned_managed_identity" };
}

export function buildAzureSearchDataSource(
  config: Pick<RagConfiguration, "searchEndpoint" | "searchIndexName" | "searchApiKey">
): AzureSearchDataSource | undefined {
  if (!config.searchEndpoint || !config.searchIndexName) {
    return undefined;
  }

  return {
    type: "azure_search",
    parameters: {
      endpoint: config.searchEndpoint,
      index_name: config.searchIndexName,
      authentication: buildSearchAuthentication(config.searchApiKey)
    }
  };
}
