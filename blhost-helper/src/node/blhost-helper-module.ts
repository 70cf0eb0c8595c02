import { Container } from 'inversify';
import {
  BlhostService,
  DeviceCatalog,
  DeviceSession,
  PromptService,
  ResponseService,
} from '../common/protocol';
import { BlhostClient, BlhostClientImpl } from './blhost-client';
import { BlhostServiceImpl } from './blhost-service-impl';
import { ConsoleResponseService } from './console-response-service';
import { DeviceConfigResolver } from './device-config-resolver';
import { DeviceSetup } from './device-setup';
import { PromptServiceImpl, PromptStreams } from './prompt-service-impl';
import { HelperSettings } from './settings-reader';

/**
 * Everything that does not depend on the selected device. `DeviceSession` is bound by `bindDeviceSession` once the device is resolved.
 */
export function createBlhostHelperContainer(
  settings: HelperSettings,
  catalog: DeviceCatalog
): Container {
  const container = new Container({ defaultScope: 'Singleton' });
  container.bind(HelperSettings.Token).toConstantValue(settings);
  container.bind(DeviceCatalog.Token).toConstantValue(catalog);
  container.bind(ConsoleResponseService).toSelf().inSingletonScope();
  container.bind(ResponseService).toService(ConsoleResponseService);
  container
    .bind<PromptStreams>(PromptStreams)
    .toConstantValue({ input: process.stdin, output: process.stdout });
  container.bind(PromptServiceImpl).toSelf().inSingletonScope();
  container.bind(PromptService).toService(PromptServiceImpl);
  container.bind(DeviceConfigResolver).toSelf().inSingletonScope();
  container.bind(DeviceSetup).toSelf().inSingletonScope();
  container.bind(BlhostClientImpl).toSelf().inSingletonScope();
  container.bind(BlhostClient).toService(BlhostClientImpl);
  container.bind(BlhostServiceImpl).toSelf().inSingletonScope();
  container.bind(BlhostService).toService(BlhostServiceImpl);
  return container;
}

export function bindDeviceSession(
  container: Container,
  session: DeviceSession
): void {
  container.bind(DeviceSession).toConstantValue(session);
}
