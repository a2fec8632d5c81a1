import path from "path";
import type { PortalConfig } from "./config";
import { BlobStore } from "./lib/blob-store";
import { DepartmentQueue } from "./lib/department-queue";
import { JsonDocumentStore } from "./lib/document-store";
import { IdentityResolver, SALT_ROUNDS } from "./lib/identity";
import { RoleRegistry } from "./lib/roles";
import { TicketThread } from "./lib/ticket-thread";
import { createCollections, JsonStorage, type IStorage, type PortalCollections } from "./storage";

/** Everything a request handler needs, built once per process. */
export interface Portal {
  config: PortalConfig;
  collections: PortalCollections;
  storage: IStorage;
  roles: RoleRegistry;
  identity: IdentityResolver;
  departments: DepartmentQueue;
  tickets: TicketThread;
  journalFiles: BlobStore;
  assetFiles: BlobStore;
}

export function createPortal(config: PortalConfig, options: { saltRounds?: number } = {}): Portal {
  const collections = createCollections(new JsonDocumentStore(config.dataDir));
  const roles = new RoleRegistry(collections.roles);

  return {
    config,
    collections,
    storage: new JsonStorage(collections),
    roles,
    identity: new IdentityResolver(
      config.admin_users,
      collections.users,
      roles,
      options.saltRounds ?? SALT_ROUNDS,
    ),
    departments: new DepartmentQueue(collections.departments),
    tickets: new TicketThread(collections.tickets),
    journalFiles: new BlobStore(path.join(config.uploadDir, "journals")),
    assetFiles: new BlobStore(path.join(config.uploadDir, "assets")),
  };
}
