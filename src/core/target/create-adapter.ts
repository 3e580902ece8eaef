import { resolve } from 'path';
import { SERIAL_DEFAULTS } from '../../constants/index.js';
import type { PipBridgeConfig, TargetSelection } from '../../types/index.js';
import { TargetIOError, ValidationError } from '../../utils/errors.js';
import { isDirectory } from '../../utils/fs.js';
import { DirectoryTargetAdapter } from './directory-adapter.js';
import { MountTargetAdapter } from './mount-adapter.js';
import { SerialTargetAdapter } from './serial-adapter.js';
import { SerialLink, SerialPortLink } from './serial-link.js';
import type { TargetAdapter } from './target-adapter.js';
import { DetectedTarget, detectTarget } from './target-detection.js';

export interface AdapterFactoryDeps {
  detect?: () => Promise<DetectedTarget>;
  openSerialLink?: (port: string, baudRate: number) => Promise<SerialLink>;
}

/**
 * Open the target named by exactly one of --port, --mount, --dir, or the
 * auto-detected one when none is given.
 */
export async function createTargetAdapter(
  selection: TargetSelection,
  config: PipBridgeConfig = {},
  deps: AdapterFactoryDeps = {}
): Promise<TargetAdapter> {
  const given = (['port', 'mount', 'dir'] as const).filter(key => selection[key] !== undefined && selection[key] !== '');
  if (given.length > 1) {
    throw new ValidationError(`Only one of --port, --mount and --dir can be given (got ${given.map(key => `--${key}`).join(', ')})`);
  }

  if (selection.dir) {
    return new DirectoryTargetAdapter(resolve(selection.dir));
  }
  if (selection.mount) {
    return openMount(selection.mount);
  }
  if (selection.port) {
    return openSerial(selection.port, config, deps);
  }

  const detected = await (deps.detect ?? detectTarget)();
  return detected.kind === 'serial'
    ? openSerial(detected.port, config, deps)
    : openMount(detected.mount);
}

async function openMount(mount: string): Promise<TargetAdapter> {
  const mountPoint = resolve(mount);
  if (!(await isDirectory(mountPoint))) {
    throw new ValidationError(`Mount point does not exist: ${mount}`);
  }
  return new MountTargetAdapter(mountPoint);
}

async function openSerial(port: string, config: PipBridgeConfig, deps: AdapterFactoryDeps): Promise<TargetAdapter> {
  const baudRate = config.serial?.baudRate ?? SERIAL_DEFAULTS.BAUD_RATE;
  const open = deps.openSerialLink ?? ((path: string, rate: number) => SerialPortLink.open(path, rate));
  let link: SerialLink;
  try {
    link = await open(port, baudRate);
  } catch (error) {
    throw new TargetIOError('connect', port, error);
  }
  return SerialTargetAdapter.connect(link, { portName: port, timeoutMs: config.serial?.timeoutMs });
}
