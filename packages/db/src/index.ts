export * from "./schema/index.js";
export {
  createDbClient,
  closeDbClient,
  type DbClient,
  type DbClientOptions,
  type DbExecutor,
} from "./client.js";
