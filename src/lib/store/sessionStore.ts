import { loadConfig } from "@/lib/config";
import type { ReviewSession } from "@/lib/review/reviewSession";

const GLOBAL_KEY = "__dssReviewSessionStore__";

type StoredSession = {
  session: ReviewSession;
  expiresAtMs: number;
};

type StoredSessionState =
  | { state: "ok"; record: StoredSession }
  | { state: "expired" }
  | { state: "missing" };

type SessionStore = Map<string, StoredSession>;

type StoreContainer = {
  [GLOBAL_KEY]?: SessionStore;
};

// Registry of live sessions for the hosting process. Each entry owns its own
// decision store; only the lookup table is shared.
const globalContainer = globalThis as typeof globalThis & StoreContainer;

const getStore = (): SessionStore => {
  const existing = globalContainer[GLOBAL_KEY];
  if (existing) {
    return existing;
  }

  const created: SessionStore = new Map();
  globalContainer[GLOBAL_KEY] = created;
  return created;
};

const isExpired = (record: StoredSession): boolean => Date.now() >= record.expiresAtMs;

export const purgeExpiredSessions = (): void => {
  const store = getStore();
  for (const [id, record] of store.entries()) {
    if (isExpired(record)) {
      store.delete(id);
    }
  }
};

export const getDefaultExpiryMs = (): number => Date.now() + loadConfig().sessionTtlMs;

export const saveSession = (
  sessionId: string,
  session: ReviewSession,
  expiresAtMs: number = getDefaultExpiryMs(),
): void => {
  purgeExpiredSessions();
  getStore().set(sessionId, { session, expiresAtMs });
};

export const getStoredSessionState = (sessionId: string): StoredSessionState => {
  const store = getStore();
  const record = store.get(sessionId);
  if (!record) {
    purgeExpiredSessions();
    return { state: "missing" };
  }

  if (isExpired(record)) {
    store.delete(sessionId);
    purgeExpiredSessions();
    return { state: "expired" };
  }

  purgeExpiredSessions();
  return { state: "ok", record };
};

export const clearSessions = (): void => {
  getStore().clear();
};
