import { AsyncLocalStorage } from "node:async_hooks";

interface UserContext {
  userId: number;
}

const userStore = new AsyncLocalStorage<UserContext>();

/** Id of the user the current request authenticated as. */
export function getUserId(): number {
  const store = userStore.getStore();
  if (!store) {
    throw new Error("getUserId() called outside of an authenticated request");
  }
  return store.userId;
}

export function runWithUser<T>(userId: number, fn: () => T): T {
  return userStore.run({ userId }, fn);
}
