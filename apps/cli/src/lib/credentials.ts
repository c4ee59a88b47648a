import { AzureCliCredential, getBearerTokenProvider, type TokenCredential } from "@azure/identity";
import type { AccessTokenProvider } from "./azure-openai-chat.js";

export const COGNITIVE_SERVICES_SCOPE = "https://cognitiveservices.azure.com/.default";

// Azure CLI credential so the token follows the tenant picked with `az login`.
export function createAccessTokenProvider(
  credential: TokenCredential = new AzureCliCredential()
): AccessTokenProvider {
  return getBearerTokenProvider(credential, COGNITIVE_SERVICES_SCOPE);
}
