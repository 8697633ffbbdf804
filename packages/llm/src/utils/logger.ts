type ToolStatus = 'started' | 'completed' | 'error';

type ChatLogEvent =
  | Readonly<{ domain: 'chat'; action: 'request'; model: string; messageCount: number; streaming: boolean }>
  | Readonly<{ domain: 'chat'; action: 'round_start'; turnId: string; round: number }>
  | Readonly<{ domain: 'chat'; action: 'tool_call'; turnId: string; tool: string; status: ToolStatus; durationMs?: number }>
  | Readonly<{ domain: 'chat'; action: 'response'; turnId: string; rounds: number; durationMs: number }>
  | Readonly<{ domain: 'chat'; action: 'max_rounds'; turnId: string; rounds: number }>
  | Readonly<{ domain: 'chat'; action: 'error'; error: string; statusCode: number | null }>;

type SearchLogEvent =
  | Readonly<{ domain: 'search'; action: 'request'; provider: string; queryLength: number }>
  | Readonly<{ domain: 'search'; action: 'error'; provider: string; error: string }>;

export type LogEvent = ChatLogEvent | SearchLogEvent;

export type Logger = (event: LogEvent) => void;

/** One JSON line per event on stdout. */
export const consoleLogger: Logger = (event) => {
  console.log(JSON.stringify(event));
};

export const silentLogger: Logger = () => {};
