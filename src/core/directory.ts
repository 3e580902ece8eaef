import * as os from 'os';
import * as path from 'path';
import { PipBridgeDirectories } from '../types/index.js';
import { DIR_PATTERNS } from '../constants/index.js';

/**
 * Cross-platform directory resolution following platform conventions
 */

const APP_NAME = 'pipbridge';

/**
 * Platform cache directory: %LOCALAPPDATA%\pipbridge\cache on Windows,
 * ~/Library/Caches/pipbridge on macOS, $XDG_CACHE_HOME/pipbridge elsewhere.
 */
function getPlatformCacheDirectory(env: NodeJS.ProcessEnv, platform: NodeJS.Platform): string {
  const homeDir = os.homedir();
  switch (platform) {
    case 'win32':
      return path.join(env.LOCALAPPDATA ?? path.join(homeDir, 'AppData', 'Local'), APP_NAME, 'cache');
    case 'darwin':
      return path.join(homeDir, 'Library', 'Caches', APP_NAME);
    default:
      return path.join(env.XDG_CACHE_HOME ?? path.join(homeDir, '.cache'), APP_NAME);
  }
}

/**
 * Config lives in ~/.pipbridge (or $PIPBRIDGE_HOME); the cache follows the platform
 * convention unless $PIPBRIDGE_CACHE_DIR says otherwise.
 */
export function getPipBridgeDirectories(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): PipBridgeDirectories {
  const config = env.PIPBRIDGE_HOME || path.join(os.homedir(), DIR_PATTERNS.PIPBRIDGE);
  const cache = env.PIPBRIDGE_CACHE_DIR || getPlatformCacheDirectory(env, platform);

  return {
    config,
    cache,
    workspaces: path.join(cache, DIR_PATTERNS.WORKSPACES),
    pipCache: path.join(cache, DIR_PATTERNS.PIP_CACHE)
  };
}
