// Body of POST /chat
export interface ChatRequest {
  _id: string;
  message: string;
}

export interface ChatExchange {
  device_id: string;
  message: string;
  response: string;
  model: string;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}
