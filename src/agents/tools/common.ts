import type { TSchema } from "@sinclair/typebox";

export { readStringParam, readNumberParam, readBooleanParam } from "../../utils/params.js";

export interface AgentToolResult {
  content: Array<{ type: "text"; text: string }>;
  details: unknown;
}

export interface AgentTool<TParams extends TSchema = TSchema> {
  label: string;
  name: string;
  description: string;
  parameters: TParams;
  execute: (toolCallId: string, args: unknown) => Promise<AgentToolResult>;
}

export type AnyAgentTool = AgentTool;

export function jsonResult(payload: unknown): AgentToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
    details: payload,
  };
}
