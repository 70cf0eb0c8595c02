import { expect } from 'chai';
import { join } from 'node:path';
import * as temp from 'temp';
import { OutputMessage } from '../../common/protocol';
import { DeviceSetup } from '../../node/device-setup';
import {
  RecordingResponseService,
  ScriptedPromptService,
  createTestContainer,
  createTestSettings,
  writeFcbFiles,
} from './test-bindings';

const track = temp.track();

describe('device-setup', () => {
  let fcbDir: string;
  let setup: DeviceSetup;
  let responses: RecordingResponseService;
  let prompts: ScriptedPromptService;

  beforeEach(async () => {
    fcbDir = track.mkdirSync();
    await writeFcbFiles(fcbDir, ['4M', '16M']);
    const container = createTestContainer(
      createTestSettings({ fcbDir, baudrate: 115200 })
    );
    setup = container.get(DeviceSetup);
    responses = container.get(RecordingResponseService);
    prompts = container.get(ScriptedPromptService);
  });

  afterEach(() => track.cleanupSync());

  it('should ask for the variant of an ambiguous category', async () => {
    prompts.variant = 'FCM363XAC';
    const session = await setup.setup({ device: 'FCM363X' });
    expect(prompts.calls).to.be.deep.equal(['variant:FCM363X']);
    expect(prompts.candidates.map(({ id }) => id)).to.be.deep.equal([
      'FCM363XAA',
      'FCM363XAC',
    ]);
    expect(session?.device.variant).to.be.equal('FCM363XAC');
    expect(session?.connection).to.be.deep.equal({
      interface: 'usb',
      usbId: '0x1FC9,0x0020',
    });
    expect(responses.chunks()).to.be.deep.equal([
      'Using interface: USB\n',
      'Device Category: FCM363X\n',
      'Device Variant: FCM363XAC\n',
      'Interface: USB\n',
      'Flash size: 16M (FCB: fcb_16M.bin)\n',
      'Connection params: -u 0x1FC9,0x0020\n',
    ]);
  });

  it('should stop when the variant selection is cancelled', async () => {
    prompts.variant = undefined;
    expect(await setup.setup({ device: 'FCM363X' })).to.be.undefined;
  });

  it('should auto-select the only variant of a category', async () => {
    const session = await setup.setup({ device: 'FCM363XL', port: 'COM3' });
    expect(session?.connection).to.be.deep.equal({
      interface: 'uart',
      port: 'COM3',
      baudrate: 115200,
    });
    expect(responses.chunks().slice(0, 2)).to.be.deep.equal([
      'Auto-selected variant: FCM363XLAC\n',
      'Using interface: UART\n',
    ]);
  });

  it('should prefer the baud rate of the command line', async () => {
    const session = await setup.setup({
      device: 'FCM363XAA',
      interface: 'uart',
      port: '/dev/ttyUSB0',
      baudrate: 921600,
    });
    expect(session?.connection).to.be.deep.equal({
      interface: 'uart',
      port: '/dev/ttyUSB0',
      baudrate: 921600,
    });
  });

  it('should require a port for UART', async () => {
    expect(await setup.setup({ device: 'FCM363XLAC' })).to.be.undefined;
    expect(responses.chunks(OutputMessage.Severity.Error)).to.be.deep.equal([
      'Error: UART interface requires serial port specification (-p option)\nExamples: -p COM3 (Windows), -p /dev/ttyUSB0 (Linux)\n',
    ]);
  });

  it('should list the supported models of an unknown device', async () => {
    expect(await setup.setup({ device: 'NOPE' })).to.be.undefined;
    expect(responses.chunks(OutputMessage.Severity.Error)).to.be.deep.equal([
      'Error: Unsupported device model: NOPE\n',
      'Supported models: FCM363X, FCM363XAA, FCM363XAC, FCM363XL, FCM363XLAC, FCMX, FCMXAA\n',
    ]);
  });

  it('should list the supported interfaces of the category', async () => {
    expect(
      await setup.setup({ device: 'FCM363XLAC', interface: 'usb' })
    ).to.be.undefined;
    expect(responses.chunks(OutputMessage.Severity.Error)).to.be.deep.equal([
      'Error: Device FCM363XL does not support USB interface\n',
      'Supported interfaces: uart\n',
    ]);
  });

  it('should ask for the interface when there is no default', async () => {
    expect(await setup.setup({ device: 'FCMXAA' })).to.be.undefined;
    expect(responses.chunks(OutputMessage.Severity.Error)).to.be.deep.equal([
      'Error: Multiple interfaces available for FCMX: usb, uart\n',
      'Please specify interface with -i option\n',
    ]);
  });

  it('should report a missing FCB file', async () => {
    expect(
      await setup.setup({ device: 'FCMXAA', interface: 'usb', flashSize: '8M' })
    ).to.be.undefined;
    expect(responses.chunks(OutputMessage.Severity.Error)).to.be.deep.equal([
      `Error: FCB file does not exist: ${join(fcbDir, 'fcb_8M.bin')}\n`,
    ]);
  });
});
