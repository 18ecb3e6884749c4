/** A tool call requested by the model. Read-only once it reaches the dispatcher. */
export type ToolCall = {
  readonly id: string;
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
};

export type ResultMessage = {
  role: "tool";
  content: string;
  toolCallId: string;
  name: string;
};
