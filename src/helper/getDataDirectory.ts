import path from 'path';
import os from 'os';

const DIR_NAME = 'billable-data';

export function getDataDirectory(basePath: string | undefined): string {
  return basePath ? path.join(basePath, DIR_NAME) : path.join(os.homedir(), DIR_NAME);
}
