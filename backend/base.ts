/**
 * @module Backend Base
 * @description Wraps a synchronous storage driver into the Result-returning `Storage` interface.
 */

import type {
  EdgeError,
  EdgeEvent,
  EventHandler,
  Result,
  Role,
  Storage,
  StorageReader,
  StorageWriter,
  WriteOpts,
} from "../types";
import { ok, err } from "../types";

/**
 * What a backend provides. `transaction` must be atomic: if `fn` throws, every
 * write made inside it is undone before the exception propagates.
 */
export type StorageDriver = {
  reader: StorageReader;
  writer: StorageWriter;
  transaction: <T>(fn: () => T) => T;
  read_transaction: <T>(fn: () => T) => T;
  /** Creates the schema and the readiness marker; returns true if the marker already existed. */
  provision: () => boolean;
  close: () => void;
};

class Rollback extends Error {
  readonly error: EdgeError;

  constructor(error: EdgeError) {
    super(`rollback: ${error.kind}`);
    this.error = error;
  }
}

class DeadlineExceeded extends Error {
  constructor() {
    super("deadline exceeded");
  }
}

/**
 * Create an event emitter function from an optional handler.
 */
export function create_emitter(handler?: EventHandler): (event: EdgeEvent) => void {
  return (event: EdgeEvent) => handler?.(event);
}

export function create_storage(driver: StorageDriver, role: Role, on_event?: EventHandler): Storage {
  const emit = create_emitter(on_event);

  function aborted(operation: string, reason: "timeout" | "storage_failure", cause?: unknown): Result<never, EdgeError> {
    const error: EdgeError = { kind: "transaction_aborted", operation, reason, cause };
    emit({ type: "error", error });
    return err(error);
  }

  return {
    role,
    on_event,

    read(fn, operation = "read") {
      try {
        return ok(driver.read_transaction(() => fn(driver.reader)));
      } catch (cause) {
        return aborted(operation, "storage_failure", cause);
      }
    },

    write<T>(fn: (tx: StorageWriter) => Result<T, EdgeError>, opts: WriteOpts = {}): Result<T, EdgeError> {
      const operation = opts.operation ?? "write";
      if (role !== "writer") {
        return err({ kind: "unauthorized", operation });
      }

      const { deadline } = opts;
      if (deadline !== undefined && Date.now() > deadline) {
        return aborted(operation, "timeout");
      }

      try {
        const value = driver.transaction(() => {
          const result = fn(driver.writer);
          if (!result.ok) throw new Rollback(result.error);
          if (deadline !== undefined && Date.now() > deadline) throw new DeadlineExceeded();
          return result.value;
        });
        return ok(value);
      } catch (cause) {
        if (cause instanceof Rollback) return err(cause.error);
        if (cause instanceof DeadlineExceeded) return aborted(operation, "timeout");
        return aborted(operation, "storage_failure", cause);
      }
    },

    provision() {
      if (role !== "writer") {
        return err({ kind: "unauthorized", operation: "provision" });
      }
      try {
        return ok({ already_provisioned: driver.provision() });
      } catch (cause) {
        return aborted("provision", "storage_failure", cause);
      }
    },

    is_provisioned() {
      try {
        return driver.reader.is_provisioned();
      } catch {
        return false;
      }
    },

    close() {
      driver.close();
    },
  };
}
