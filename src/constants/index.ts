/**
 * Shared constants for the pipbridge CLI application
 * Single source of truth for directory names, metadata file names,
 * default indexes and other constants used throughout the application.
 */

export const DIR_PATTERNS = {
  PIPBRIDGE: '.pipbridge',
  WORKSPACES: 'workspaces',
  PIP_CACHE: 'pip',
  VENV: 'venv',
  DIST_INFO_SUFFIX: '.dist-info',
  PYCACHE: '__pycache__'
} as const;

export const FILE_PATTERNS = {
  CONFIG_JSONC: 'config.jsonc',
  CONFIG_JSON: 'config.json',
  WORKSPACE_META: 'workspace.json',
  WORKSPACE_LOCK: 'workspace.lock',
  PY_FILES: '.py',
  MPY_FILES: '.mpy',
  PYC_FILES: '.pyc'
} as const;

/**
 * Files inside a `.dist-info` directory.
 */
export const META_FILES = {
  METADATA: 'METADATA',
  RECORD: 'RECORD',
  INSTALLER: 'INSTALLER',
  WHEEL: 'WHEEL'
} as const;

export const META_ENCODING = 'utf8' as const;
export const METADATA_VERSION = '2.1' as const;

export const INDEX_URLS = {
  MP_ORG: 'https://micropython.org/pi',
  PYPI_SIMPLE: 'https://pypi.org/simple'
} as const;

export const INSTALLER_DEFAULTS = {
  PIP_SPEC: 'pip==24.0.*',
  WHEEL_SPEC: 'wheel==0.43.*',
  NAME: 'pip'
} as const;

/**
 * Distributions (and loose files) that belong to the workspace itself and are
 * never part of a snapshot.
 */
export const WORKSPACE_TOOLING = {
  DISTS: ['pip', 'setuptools', 'pkg_resources', 'wheel', '_distutils_hack'],
  FILES: ['easy_install.py', 'distutils-precedence.pth']
} as const;

/**
 * CPython-only helper dependencies of board libraries. The proxy serves them as
 * empty placeholder wheels so pip is satisfied without transferring them.
 */
export const DEFAULT_DUMMY_PACKAGES = [
  'adafruit-blinka',
  'adafruit-platformdetect',
  'adafruit-pureio',
  'binho-host-adapter',
  'pyftdi',
  'pyserial',
  'pyusb',
  'sysv-ipc',
  'typing-extensions'
] as const;

export const DEFAULT_EXCLUDE_PATTERNS = [
  '**/__pycache__/**',
  '**/*.pyc'
] as const;

export const TIMEOUTS = {
  UPSTREAM_MS: 15_000,
  SERIAL_MS: 10_000
} as const;

export const SERIAL_DEFAULTS = {
  BAUD_RATE: 115_200,
  /** Raw bytes per write request; base64 grows them by a third */
  WRITE_CHUNK_BYTES: 192,
  /** Base64 characters per line when sending the helper */
  HELPER_LINE_CHARS: 192,
  READ_CHUNK_BYTES: 1024,
  DEFAULT_LIB_DIR: '/lib'
} as const;

/**
 * USB vendor/product pairs of boards that run MicroPython or CircuitPython.
 * A missing productId matches any product of that vendor.
 */
export const KNOWN_BOARD_SIGNATURES: ReadonlyArray<{ vendorId: string; productId?: string; label: string }> = [
  { vendorId: '2e8a', label: 'Raspberry Pi Pico' },
  { vendorId: '239a', label: 'Adafruit board' },
  { vendorId: 'f055', productId: '9800', label: 'MicroPython pyboard' },
  { vendorId: '303a', label: 'Espressif native USB' },
  { vendorId: '1a86', productId: '7523', label: 'CH340 USB serial' },
  { vendorId: '10c4', productId: 'ea60', label: 'CP210x USB serial' }
];

export const VOLUME_SIGNATURES = {
  LABELS: ['CIRCUITPY'],
  MARKER_FILES: ['boot_out.txt'],
  LIB_DIR: 'lib'
} as const;

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  PARTIAL: 2
} as const;

