import { expect } from 'chai';
import { DeviceCatalog } from '../../common/protocol';
import { formatDeviceList } from '../../node/device-list';

const Indent = ' '.repeat(20);

describe('device-list', () => {
  const catalog: DeviceCatalog = {
    devices: {
      FCM363X: {
        description: 'Test module',
        interfaces: ['usb', 'uart'],
        default_interface: 'usb',
        variants: {
          FCM363XAA: {
            flash_configs: { '4M': { fcb_file: 'a.bin', default: true } },
          },
          FCM363XAC: {
            flash_configs: {
              '4M': { fcb_file: 'a.bin', default: false },
              '16M': { fcb_file: 'b.bin', default: true },
            },
          },
        },
      },
      FCMA62N: {
        interfaces: ['uart'],
        variants: {
          FCMA62NAA: {
            flash_configs: { '4M': { fcb_file: 'a.bin', default: true } },
          },
        },
      },
    },
  };

  it('should list categories, interfaces and variants with their defaults', () => {
    const lines = formatDeviceList(catalog);
    expect(lines.slice(0, 13)).to.be.deep.equal([
      'Supported devices:',
      '='.repeat(90),
      '',
      `${'FCM363X'.padEnd(20)} - Test module`,
      `${Indent}   Interfaces: usb, uart (default: usb)`,
      `${Indent}   Variants:`,
      `${Indent}     - ${'FCM363XAA'.padEnd(15)} Flash: 4M (default)`,
      `${Indent}     - ${'FCM363XAC'.padEnd(15)} Flash: 4M, 16M (default)`,
      '',
      `${'FCMA62N'.padEnd(20)} - FCMA62N`,
      `${Indent}   Interfaces: uart`,
      `${Indent}   Variants:`,
      `${Indent}     - ${'FCMA62NAA'.padEnd(15)} Flash: 4M (default)`,
    ]);
  });

  it('should end with the usage examples', () => {
    const lines = formatDeviceList(catalog);
    expect(lines.slice(13, 17)).to.be.deep.equal([
      '',
      '='.repeat(90),
      '',
      'Usage examples:',
    ]);
    expect(lines).to.include('    blhost-helper -d FCM363XAB --test');
  });
});
