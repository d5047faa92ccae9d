/**
 * Restorer Port Interface
 *
 * Rewrites the decompiled content of one file. The real implementation is an
 * external language-model service; this repo only ships the passthrough
 * restorer below. Requests arrive in dependency order, so every dependency
 * listed in a request has already been restored.
 */

export interface RestoredDependency {
  /** Canonical key of the dependency */
  nodeKey: string;
  /** Identifier the dependency is required by, when it lies under a search root */
  moduleName?: string;
  /** Restored text of the dependency */
  content: string;
}

export interface RestoreRequest {
  nodeKey: string;
  moduleName?: string;
  /** Decompiled text as read during discovery */
  content: string;
  /** Already-restored dependencies; members of the same cycle group may be missing */
  dependencies: RestoredDependency[];
}

export interface RestorerPort {
  /** Return the restored text; an empty string means "no result" */
  restore(request: RestoreRequest): Promise<string>;
}

/**
 * Returns the decompiled content unchanged.
 */
export const passthroughRestorer: RestorerPort = {
  async restore(request: RestoreRequest): Promise<string> {
    return request.content;
  },
};
