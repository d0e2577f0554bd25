import { BaseClient } from '@stackreport/core';

import type { NodeClientOptions } from './types';

/**
 * Node.js 中使用的客户端
 *
 * @see NodeClientOptions for documentation on configuration options.
 */
export class NodeClient extends BaseClient<NodeClientOptions> {
  /**
   * Creates a new Node SDK instance.
   * @param options Configuration options for this SDK.
   */
  public constructor(options: NodeClientOptions) {
    super(options);
  }
}
