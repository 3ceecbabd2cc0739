import type { StoreFile } from "../db";
import { ConflictError, NotFoundError } from "../errors";
import { createLogger, type Logger } from "../logger";
import type { StorageObject } from "../types/clients";
import type { ProviderResolver } from "./providerResolver";
import type { StoreRepository } from "./stores";

export const ROOT_KEY = "/";

/**
 * Index a node's children by key.
 * Rebuilt from the ordered children on every call; never stored.
 */
export function getChildrenMap(file: StoreFile): Map<string, StoreFile> {
  return new Map(file.children.map((child) => [child.key, child]));
}

function splitKey(key: string): string[] {
  return key.split("/").filter((segment) => segment.length > 0);
}

/**
 * Find a node by key, walking one path segment at a time
 */
export function findFile(root: StoreFile, key: string): StoreFile | null {
  const segments = splitKey(key);
  if (segments.length === 0) {
    return root;
  }

  let node = root;
  for (let i = 0; i < segments.length; i++) {
    const childKey = segments.slice(0, i + 1).join("/");
    const child = getChildrenMap(node).get(childKey);
    if (!child) {
      return null;
    }
    node = child;
  }

  return node;
}

function createNode(
  key: string,
  title: string,
  createdAt: string,
  isLeaf: boolean,
): StoreFile {
  return { key, title, size: 0, createdAt, isLeaf, url: "", children: [] };
}

/**
 * Build a store's file tree from a storage listing.
 *
 * Nodes are keyed by their slash-joined path segments ("docs/2024/a.md").
 * Keys ending with "/" only mark directories. A directory's size is the
 * total size of the files below it.
 */
export function buildFileTree(objects: StorageObject[]): StoreFile {
  const root = createNode(ROOT_KEY, "", "", false);
  // Nodes by key while building; the finished tree only keeps children arrays
  const nodes = new Map<string, StoreFile>([[ROOT_KEY, root]]);

  const sorted = [...objects].sort((a, b) =>
    a.key < b.key ? -1 : a.key > b.key ? 1 : 0,
  );

  for (const object of sorted) {
    const segments = splitKey(object.key);
    if (segments.length === 0) {
      continue;
    }

    const isDirectoryMarker = object.key.endsWith("/");
    const createdAt = object.lastModified.toISOString();
    const ancestors: StoreFile[] = [root];
    let parent = root;

    for (let i = 0; i < segments.length; i++) {
      const isLeaf = i === segments.length - 1 && !isDirectoryMarker;
      const key = segments.slice(0, i + 1).join("/");

      let node = nodes.get(key);
      if (node && node.isLeaf !== isLeaf) {
        throw new ConflictError(`Path is both a file and a directory: ${key}`);
      }
      if (!node) {
        node = createNode(key, segments[i], createdAt, isLeaf);
        nodes.set(key, node);
        parent.children.push(node);
      }

      if (isLeaf) {
        // A repeated key replaces the earlier listing entry
        const delta = object.size - node.size;
        node.size = object.size;
        node.url = object.url;
        for (const ancestor of ancestors) {
          ancestor.size += delta;
        }
      } else {
        ancestors.push(node);
        parent = node;
      }
    }
  }

  return root;
}

/**
 * Keeps a store's persisted file tree in line with its storage backend
 */
export class StoreFileService {
  private readonly log: Logger;

  constructor(
    private readonly stores: Pick<
      StoreRepository,
      "getStoreById" | "updateStore"
    >,
    private readonly resolver: ProviderResolver,
  ) {
    this.log = createLogger("store-files");
  }

  /**
   * List the store's storage, rebuild its tree and write it back
   */
  async refreshFileTree(id: string): Promise<StoreFile> {
    const store = await this.stores.getStoreById(id);
    if (!store) {
      throw new NotFoundError("Store", id);
    }

    const storageClient = await this.resolver.resolveStorageClient(store);
    const objects = await storageClient.listObjects("");
    const fileTree = buildFileTree(objects);

    // The store may have been deleted or re-keyed since it was read
    const updated = await this.stores.updateStore(id, { ...store, fileTree });
    if (!updated) {
      throw new NotFoundError("Store", id);
    }

    this.log.info(
      { owner: store.owner, store: store.name, objects: objects.length },
      "Store file tree rebuilt",
    );
    return fileTree;
  }
}
