import { env, type Env } from "../config/env.js";
import { FileBackedObservationStore, InMemoryObservationStore, type ObservationStore } from "./observation-store.js";
import { RedisObservationStore } from "./redis-observation-store.js";

type StoreEnv = Pick<Env, "STORE_DRIVER" | "STORE_PATH" | "REDIS_URL" | "REDIS_PREFIX">;

export function createObservationStore(config: StoreEnv = env): ObservationStore {
  switch (config.STORE_DRIVER) {
    case "memory":
      return new InMemoryObservationStore();
    case "redis":
      return new RedisObservationStore({
        redisUrl: config.REDIS_URL,
        redisPrefix: config.REDIS_PREFIX,
      });
    case "file":
      return new FileBackedObservationStore(config.STORE_PATH);
  }
}
