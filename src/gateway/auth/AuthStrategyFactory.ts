import { UpstreamAuthScheme } from '../../types/enums.js';
import type { IAuthStrategy } from './IAuthStrategy.js';
import type { ProbeAuthConfig } from './ProbeAuthStrategy.js';
import { BasicAuthStrategy } from './BasicAuthStrategy.js';
import { IBSessionAuthStrategy } from './IBSessionAuthStrategy.js';
import { TokenAuthStrategy } from './TokenAuthStrategy.js';
import { createLogger } from '../../logger/index.js';

// Logger for AuthStrategyFactory
const logger = createLogger('AuthStrategyFactory');

/**
 * Authentication strategy factory
 *
 * Creates the strategy for the configured upstream scheme
 */
export class AuthStrategyFactory {
  static create(scheme: UpstreamAuthScheme, config: ProbeAuthConfig): IAuthStrategy {
    logger.debug({ scheme, probePath: config.probePath }, 'Creating upstream auth strategy');

    switch (scheme) {
      case UpstreamAuthScheme.Basic:
        return new BasicAuthStrategy(config);

      case UpstreamAuthScheme.IBSession:
        return new IBSessionAuthStrategy(config);

      case UpstreamAuthScheme.Token:
        return new TokenAuthStrategy(config);
    }
  }
}
