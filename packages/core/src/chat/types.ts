export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type AzureSearchAuthentication =
  | { type: "api_key"; key: string }
  | { type: "system_assigned_managed_identity" };

export type AzureSearchDataSource = {
  type: "azure_search";
  parameters: {
    endpoint: string;
    index_name: string;
    authentication: AzureSearchAuthentication;
  };
};

export type ChatDataSource = AzureSearchDataSource;

export type ChatRequest = {
  messages: readonly ChatMessage[];
  dataSources?: readonly ChatDataSource[];
};

/** Sends one chat-completions request and resolves with the raw response document. */
export interface ChatTransport {
  send(request: ChatRequest): Promise<string>;
}
