import { DeviceCatalog } from '../common/protocol';

const Rule = '='.repeat(90);
const Indent = ''.padEnd(20);

const UsageExamples = [
  'Usage examples:',
  '  # Use category name (will prompt for variant if multiple exist):',
  '    blhost-helper -d FCM363X --test',
  '',
  '  # Use specific variant name (avoids prompt):',
  '    blhost-helper -d FCM363XAB --test',
  '    blhost-helper -d FCM363XLAC --test',
  '',
  '  # Specify interface (overrides default):',
  '    blhost-helper -d FCM363X -i uart -p COM3 --test',
  '',
  '  # Use default interface:',
  '    blhost-helper -d FCM363X --test        # USB (default)',
  '    blhost-helper -d FCM363XL -p COM3 --test  # UART (default)',
  '',
  '  # Write firmware:',
  '    blhost-helper -d FCM363XAC --write -f firmware.bin',
  '    blhost-helper -d FCME63X --write -f app.bin -a 0x08000000',
];

/**
 * The `--list` report: every category with its interfaces, then its variants with their flash sizes. Defaults are marked.
 */
export function formatDeviceList(catalog: DeviceCatalog): string[] {
  const lines = ['Supported devices:', Rule];
  for (const [categoryId, category] of Object.entries(catalog.devices)) {
    let interfaces = category.interfaces.join(', ');
    if (category.default_interface) {
      interfaces += ` (default: ${category.default_interface})`;
    }
    lines.push(
      '',
      `${categoryId.padEnd(20)} - ${category.description ?? categoryId}`,
      `${Indent}   Interfaces: ${interfaces}`,
      `${Indent}   Variants:`
    );
    for (const [variantId, variant] of Object.entries(category.variants)) {
      const flashSizes = Object.entries(variant.flash_configs)
        .map(([flashSize, config]) =>
          config.default ? `${flashSize} (default)` : flashSize
        )
        .join(', ');
      lines.push(`${Indent}     - ${variantId.padEnd(15)} Flash: ${flashSizes}`);
    }
  }
  lines.push('', Rule, '', ...UsageExamples);
  return lines;
}
