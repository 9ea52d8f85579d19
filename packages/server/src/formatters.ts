// SPDX-License-Identifier: Apache-2.0

const formatRequestIdMessage = (requestId?: string): string => {
  return requestId ? `[Request ID: ${requestId}]` : '';
};

export { formatRequestIdMessage };
