export type MessageRole = "question-prompt" | "summary" | "result" | "staff-review-card";

export type MessageColor = "blurple" | "blue" | "dark_blue" | "gold" | "green" | "red" | "grey";

export type ActionStyle = "primary" | "secondary" | "success" | "danger";

export interface MessageField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface MessageAction {
  id: string;
  label: string;
  style: ActionStyle;
  disabled?: boolean;
}

export interface MessageContent {
  title: string;
  description?: string;
  color?: MessageColor;
  fields?: MessageField[];
  footer?: string;
  actions?: MessageAction[];
}

export type GatewayOp = "send" | "edit" | "delete";

export interface GatewayEnvelope {
  request_id: string;
  op: GatewayOp;
  conversation_id: string;
  message_id: string | null;
  content: MessageContent | null;
  occurred_at: string;
}

export interface GatewaySendResponse {
  message_id: string;
}

export function dmConversation(userId: string): string {
  return `dm:${userId}`;
}

export function channelConversation(channelId: string): string {
  return `channel:${channelId}`;
}

export type ReviewActionKind = "pick" | "score" | "approve" | "deny" | "view";

export function reviewActionId(kind: ReviewActionKind, applicationId: string): string {
  return `${kind}:${applicationId}`;
}
