// SPDX-License-Identifier: Apache-2.0

import { RPC_LAYOUT, RPC_PARAM_LAYOUT_KEY } from './lib/decorators';
import type { OperationHandler, RequestDetails } from './lib/types';

export class Utils {
  /**
   * Arranges the JSON-RPC params into the argument list of an operation handler,
   * according to its parameter layout. The request details always come last.
   *
   * @param method - The handler, carrying its layout metadata
   * @param rpcParams - The raw positional params of the request
   * @param requestDetails - The request context
   */
  public static arrangeRpcParams(
    method: OperationHandler,
    rpcParams: unknown[] = [],
    requestDetails: RequestDetails,
  ): unknown[] {
    const layout = method[RPC_PARAM_LAYOUT_KEY];

    if (!layout) {
      return [...rpcParams, requestDetails];
    }

    if (layout === RPC_LAYOUT.REQUEST_DETAILS_ONLY) {
      return [requestDetails];
    }

    return [...layout(rpcParams), requestDetails];
  }
}
