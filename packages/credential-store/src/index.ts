export type {
  CredentialStore,
  CredentialStoreTx,
  OrderRepository,
  IssuerRepository,
  OutboxRepository,
  CredentialRepository,
} from "./credential-store.js";
export { PostgresCredentialStore } from "./postgres-credential-store.js";
