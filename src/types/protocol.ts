import type { ErrorPayload } from './tool-result.js';

export type RequestId = string | number | null;

export interface ProtocolRequest {
  id: RequestId;
  method: string;
  params: Record<string, unknown>;
}

export type ProtocolResponse =
  | { id: RequestId; result: Record<string, unknown> }
  | { id: RequestId; error: ErrorPayload };

export interface ToolDescriptor {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}
