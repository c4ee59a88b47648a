import type { ChatRequest, ChatTransport } from "@rag-client/core";
import { ChatRequestFailedError, MAX_RESPONSE_BODY_CHARS } from "../errors.js";

export const DEFAULT_AZURE_OPENAI_API_VERSION = "2024-08-01-preview";
export const ENV_AZURE_OPENAI_API_VERSION = "AZURE_OPENAI_API_VERSION";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type AccessTokenProvider = () => Promise<string>;

export type AzureOpenAiChatTransportOptions = {
  endpoint: string;
  deploymentName: string;
  getAccessToken: AccessTokenProvider;
  apiVersion?: string;
  fetch?: FetchLike;
};

export function resolveApiVersion(env: Record<string, string | undefined> = process.env): string {
  return env[ENV_AZURE_OPENAI_API_VERSION]?.trim() || DEFAULT_AZURE_OPENAI_API_VERSION;
}

export function buildChatCompletionsUrl(input: {
  endpoint: string;
  deploymentName: string;
  apiVersion: string;
}): string {
  const base = input.endpoint.replace(/\/+$/, "");
  const url = new URL(`${base}/openai/deployments/${encodeURIComponent(input.deploymentName)}/chat/completions`);
  url.searchParams.set("api-version", input.apiVersion);
  return url.toString();
}

export function buildChatCompletionsBody(request: ChatRequest): Record<string, unknown> {
  const body: Record<string, unknown> = {
    messages: request.messages
  };
  if (request.dataSources && request.dataSources.length > 0) {
    body.data_sources = request.dataSources;
  }
  return body;
}

export function createAzureOpenAiChatTransport(options: AzureOpenAiChatTransportOptions): ChatTransport {
  const url = buildChatCompletionsUrl({
    endpoint: options.endpoint,
    deploymentName: options.deploymentName,
    apiVersion: options.apiVersion ?? DEFAULT_AZURE_OPENAI_API_VERSION
  });
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));

  return {
    async send(request) {
      const token = await options.getAccessToken();
      const response = await fetchImpl(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${token}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify(buildChatCompletionsBody(request))
      });

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        throw new ChatRequestFailedError({
          status: response.status,
          body: body.slice(0, MAX_RESPONSE_BODY_CHARS)
        });
      }

      return response.text();
    }
  };
}
