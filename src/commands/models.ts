import { parseArgs } from 'util';

import { describeError, localize } from '../i18n/localize';
import type { LocalServiceClient } from '../services/LocalServiceClient';
import type { TranslationError } from '../services/TranslationError';
import { ServiceLogger } from '../utils/logger';
import type { Result } from '../utils/result';
import type { Command, CommandIO } from './io';

export function createModelsCommand(
  client: LocalServiceClient | undefined,
  io: CommandIO,
  logger: ServiceLogger,
): Command {
  return async (args) => {
    const [action, ...rest] = args;
    if (!client) {
      io.err(localize('command.models.localOnly'));
      return 2;
    }

    const report = <T>(result: Result<T, TranslationError>): number =>
      result.fold(
        (payload) => {
          io.out(JSON.stringify(payload, null, 2));
          return 0;
        },
        (error) => {
          logger.error(`Models ${action ?? ''} failed.`, error);
          io.err(describeError(error));
          return 1;
        },
      );

    switch (action) {
      case 'status':
        return report(await client.modelsStatus());
      case 'verify':
        return report(await client.modelsVerify());
      case 'remove': {
        const removed = await client.modelsRemove();
        if (removed.isSuccess()) {
          io.out(localize('command.models.removed', removed.value.model_dir));
          return 0;
        }
        return report(removed);
      }
      case 'install': {
        const { values } = parseArgs({
          args: rest,
          options: {
            preset: { type: 'string' },
            'en-ja-url': { type: 'string' },
            'ja-en-url': { type: 'string' },
            'en-ja-sha256': { type: 'string' },
            'ja-en-sha256': { type: 'string' },
          },
        });
        const enJaUrl = values['en-ja-url'];
        const jaEnUrl = values['ja-en-url'];
        if (!values.preset && (enJaUrl || jaEnUrl)) {
          if (!enJaUrl || !jaEnUrl) {
            io.err(localize('command.models.installUsage'));
            return 2;
          }
          return report(
            await client.modelsInstall({
              enJaUrl,
              jaEnUrl,
              enJaSha256: values['en-ja-sha256'],
              jaEnSha256: values['ja-en-sha256'],
            }),
          );
        }
        return report(await client.modelsInstallPreset(values.preset));
      }
      default:
        io.err(localize('command.models.usage'));
        return 2;
    }
  };
}
