import { randomUUID } from "node:crypto";
import { clearInterval, setInterval } from "node:timers";
import * as v from "valibot";
import { isTerminal } from "../shared/stages.js";
import type { Task, TaskSSEMessage } from "../shared/types.js";
import type { ProgressBroker } from "./broker.js";
import { getLogger, type Logger } from "./logger.js";
import type { TaskStore } from "./store.js";

/** Options for {@link createSSEHandler}. */
export type TaskSSEHandlerOptions = {
  store: TaskStore;
  broker: ProgressBroker;
  /** Optional authorization check. Return `false` (or a `Promise<false>`) to respond with 403. */
  authorize?: (request: Request) => boolean | Promise<boolean>;
  /** Interval in ms between SSE heartbeat comments. Each successful write counts as subscriber activity. @default 30_000 */
  heartbeatInterval?: number;
  logger?: Logger;
};

/** A fetch-style request handler, mountable in any framework that speaks `Request`/`Response`. */
export type TaskSSEHandler = (request: Request) => Promise<Response>;

const QuerySchema = v.object({
  taskId: v.pipe(v.string(), v.trim(), v.minLength(1)),
  clientId: v.optional(v.pipe(v.string(), v.trim(), v.minLength(1))),
});

/**
 * Create a request handler that streams one task's progress via Server-Sent Events.
 *
 * The task is selected with the `taskId` query parameter; `clientId` is optional
 * and defaults to a random id. On connection the handler sends an `"init"`
 * message with the current task record. If the task has already finished the
 * stream ends there; otherwise it is registered with the broker and relays every
 * event as an `"update"` message, closing after the terminal one. A heartbeat
 * comment (`: heartbeat`) is sent periodically to keep the connection alive.
 *
 * @example
 * ```ts
 * const handler = createSSEHandler({ store, broker });
 * // GET /tasks/events?taskId=...
 * const response = await handler(request);
 * ```
 */
export function createSSEHandler(options: TaskSSEHandlerOptions): TaskSSEHandler {
  const { store, broker, authorize, heartbeatInterval = 30_000 } = options;
  const log = options.logger ?? getLogger({ module: "SSE" });

  return async (request) => {
    if (authorize) {
      const allowed = await authorize(request);
      if (!allowed) {
        return new Response("Forbidden", { status: 403 });
      }
    }

    const url = new URL(request.url);
    const query = v.safeParse(QuerySchema, {
      taskId: url.searchParams.get("taskId") ?? undefined,
      clientId: url.searchParams.get("clientId") ?? undefined,
    });
    if (!query.success) {
      return new Response("Missing taskId", { status: 400 });
    }

    const { taskId } = query.output;
    const clientId = query.output.clientId ?? randomUUID();
    const initial = await store.get(taskId);
    if (!initial) {
      return new Response("Task not found", { status: 404 });
    }

    const encoder = new TextEncoder();
    let heartbeat: ReturnType<typeof setInterval> | undefined;
    let closed = false;

    const cleanup = () => {
      if (closed) return;
      closed = true;
      clearInterval(heartbeat);
      broker.unregister(taskId, clientId);
    };

    const stream = new ReadableStream<Uint8Array>({
      start: async (controller) => {
        const write = (chunk: string) => controller.enqueue(encoder.encode(chunk));
        const send = (message: TaskSSEMessage) => write(`data: ${JSON.stringify(message)}\n\n`);
        const finish = () => {
          if (closed) return;
          cleanup();
          controller.close();
        };
        const sendInitAndMaybeFinish = (task: Task) => {
          send({ type: "init", task });
          if (isTerminal(task.status)) finish();
        };

        sendInitAndMaybeFinish(initial);
        if (closed) return;

        broker.register(
          taskId,
          clientId,
          (event) => {
            send({ type: "update", event });
            if (event.type !== "stage_update") finish();
          },
          { close: finish },
        );

        heartbeat = setInterval(() => {
          try {
            write(": heartbeat\n\n");
            broker.touch(taskId, clientId);
          } catch (error) {
            log.debug({ err: error, taskId, clientId }, "Heartbeat write failed");
            cleanup();
          }
        }, heartbeatInterval);

        // The task may have finished between the first read and registration.
        const latest = await store.get(taskId);
        if (!closed && latest && isTerminal(latest.status)) {
          sendInitAndMaybeFinish(latest);
        }
      },
      cancel() {
        cleanup();
      },
    });

    log.debug({ taskId, clientId }, "SSE stream opened");
    return new Response(stream, {
      headers: {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
      },
    });
  };
}
