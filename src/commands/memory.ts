import { localize } from '../i18n/localize';
import { TranslationService } from '../services/TranslationService';
import { ServiceLogger } from '../utils/logger';
import type { Command, CommandIO } from './io';

export function createMemoryCommand(
  service: TranslationService,
  io: CommandIO,
  logger: ServiceLogger,
): Command {
  return async ([action]) => {
    switch (action) {
      case 'stats':
        io.out(JSON.stringify(service.stats(), null, 2));
        return 0;
      case 'clear':
        await service.clearMemory();
        logger.info('Translation memory cleared by user.');
        io.out(localize('command.memory.cleared'));
        return 0;
      default:
        io.err(localize('command.memory.usage'));
        return 2;
    }
  };
}
