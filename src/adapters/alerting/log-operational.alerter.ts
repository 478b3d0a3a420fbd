import { injectable } from 'tsyringe';
import { createLogger } from '../../utils/logger.util';
import { IOperationalAlerter, OperationalAlert } from './operational-alerter.interface';

const logger = createLogger('OPS ALERT');

@injectable()
export class LogOperationalAlerter implements IOperationalAlerter {
  raise(alert: OperationalAlert): void {
    switch (alert.type) {
      case 'auth-rejected':
        logger.error(`Credential for ${alert.providerId} rejected: ${alert.message}`);
        break;
      case 'all-providers-failed':
        logger.error(
          `All providers for ${alert.kind} failed for ${alert.consecutiveCycles} consecutive cycles (${alert.providerIds.join(', ')})`
        );
        break;
    }
  }
}
