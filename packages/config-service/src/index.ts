// SPDX-License-Identifier: Apache-2.0

export { ConfigService } from './services';
export { GlobalConfig } from './services/globalConfig';
export type { ConfigKey, ConfigProperty, ConfigValues } from './services/globalConfig';
