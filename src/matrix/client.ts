import {
  ClientEvent,
  createClient,
  type MatrixClient,
  MemoryStore,
  SyncState,
} from "matrix-js-sdk";

import type { MatrixAccountConfig } from "../config/types.js";

export type MatrixAuth = {
  homeserver: string;
  userId: string;
  accessToken: string;
  initialSyncLimit?: number;
};

const DEFAULT_DEVICE_NAME = "Matrix Greeter";

export async function resolveMatrixAuth(account: MatrixAccountConfig): Promise<MatrixAuth> {
  if (account.accessToken) {
    return {
      homeserver: account.homeserver,
      userId: account.userId,
      accessToken: account.accessToken,
      initialSyncLimit: account.initialSyncLimit,
    };
  }
  if (!account.password) {
    throw new Error(
      "Matrix access token or password is required (matrix.accessToken or matrix.password)",
    );
  }

  const loginClient = createClient({ baseUrl: account.homeserver });
  const login = await loginClient.login("m.login.password", {
    identifier: { type: "m.id.user", user: account.userId },
    password: account.password,
    initial_device_display_name: account.deviceName ?? DEFAULT_DEVICE_NAME,
  });
  const accessToken = login.access_token?.trim();
  if (!accessToken) {
    throw new Error("Matrix login did not return an access token");
  }
  return {
    homeserver: account.homeserver,
    userId: login.user_id ?? account.userId,
    accessToken,
    initialSyncLimit: account.initialSyncLimit,
  };
}

export function createMatrixClient(params: {
  homeserver: string;
  userId: string;
  accessToken: string;
  localTimeoutMs?: number;
}): MatrixClient {
  return createClient({
    baseUrl: params.homeserver,
    userId: params.userId,
    accessToken: params.accessToken,
    localTimeoutMs: params.localTimeoutMs,
    store: new MemoryStore(),
  });
}

export type InitialSyncTracker = {
  /** Latches on the first Prepared or Syncing state; later reconnects leave it set. */
  isDone: () => boolean;
  wait: (params?: { timeoutMs?: number; abortSignal?: AbortSignal }) => Promise<void>;
  stop: () => void;
};

type SyncWaiter = (err?: Error) => void;

function isSyncReady(state: SyncState | null): boolean {
  return state === SyncState.Prepared || state === SyncState.Syncing;
}

export function trackInitialSync(client: MatrixClient): InitialSyncTracker {
  let done = isSyncReady(client.getSyncState());
  const waiters = new Set<SyncWaiter>();

  const settle = (err?: Error) => {
    for (const waiter of [...waiters]) waiter(err);
  };
  const onSync = (state: SyncState) => {
    if (isSyncReady(state)) {
      done = true;
      client.removeListener(ClientEvent.Sync, onSync);
      settle();
    } else if (state === SyncState.Error) {
      settle(new Error("Matrix initial sync failed"));
    }
  };
  if (!done) client.on(ClientEvent.Sync, onSync);

  const wait: InitialSyncTracker["wait"] = (params = {}) => {
    if (done) return Promise.resolve();
    const { abortSignal } = params;
    return new Promise<void>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const finish: SyncWaiter = (err) => {
        clearTimeout(timer);
        abortSignal?.removeEventListener("abort", onAbort);
        waiters.delete(finish);
        if (err) reject(err);
        else resolve();
      };
      const onAbort = () => finish(new Error("Matrix initial sync aborted"));
      if (abortSignal?.aborted) {
        onAbort();
        return;
      }
      waiters.add(finish);
      abortSignal?.addEventListener("abort", onAbort, { once: true });
      timer = setTimeout(
        () => finish(new Error("Matrix initial sync timed out")),
        Math.max(1000, params.timeoutMs ?? 15_000),
      );
    });
  };

  return {
    isDone: () => done,
    wait,
    stop: () => {
      client.removeListener(ClientEvent.Sync, onSync);
    },
  };
}
