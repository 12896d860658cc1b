/**
 * Cooperative-scheduling counter ("actor").
 *
 * A single task owns the values and processes a mailbox one message at a
 * time. Callers post a message and suspend until the owner replies, so
 * mutations are strictly serialized while no thread is ever blocked.
 *
 * @module
 */

import {
  action,
  createQueue,
  resource,
  spawn,
  suspend,
  type Operation,
} from "effection";
import { simulateWork } from "./simulate-work.ts";
import type { IsolatedCounter } from "./types.ts";

type ActorMessage =
  | { type: "write"; value: number; simulateWork: boolean }
  | { type: "read"; simulateWork: boolean }
  | { type: "reset" };

interface Envelope {
  message: ActorMessage;
  reply: (value: number) => void;
}

/**
 * Start a counter actor as a resource.
 * The owning task is halted when the enclosing scope exits.
 */
export function useCounterActor(): Operation<IsolatedCounter> {
  return resource(function* (provide) {
    const mailbox = createQueue<Envelope, never>();
    const values: number[] = [];

    function receive(message: ActorMessage): number {
      switch (message.type) {
        case "write":
          if (message.simulateWork) {
            simulateWork();
          }
          values.push(message.value);
          return message.value;
        case "read":
          if (message.simulateWork) {
            simulateWork();
          }
          return values.length === 0 ? 0 : values[values.length - 1];
        case "reset":
          values.length = 0;
          return 0;
      }
    }

    yield* spawn(function* () {
      for (;;) {
        const { value: envelope } = yield* mailbox.next();
        envelope.reply(receive(envelope.message));
      }
    });

    function send(message: ActorMessage): Operation<number> {
      return action<number>(function* (resolve) {
        mailbox.add({ message, reply: resolve });
        yield* suspend();
      });
    }

    yield* provide({
      *write(value) {
        yield* send({ type: "write", value, simulateWork: false });
      },
      read: () => send({ type: "read", simulateWork: false }),
      *writeWithSimulatedWork(value) {
        yield* send({ type: "write", value, simulateWork: true });
      },
      readWithSimulatedWork: () => send({ type: "read", simulateWork: true }),
      *reset() {
        yield* send({ type: "reset" });
      },
    });
  });
}

/**
 * Run `fn` with a fresh counter actor that is shut down afterwards.
 */
export function* withCounterActor<T>(
  fn: (actor: IsolatedCounter) => Operation<T>,
): Operation<T> {
  const task = yield* spawn(function* () {
    const actor = yield* useCounterActor();
    return yield* fn(actor);
  });
  return yield* task;
}
