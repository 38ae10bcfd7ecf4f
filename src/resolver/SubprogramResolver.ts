import fs from 'fs';
import path from 'path';
import { CheckerSettings } from '../config/settings';

export class SubprogramResolver {
  constructor(private settings: Pick<CheckerSettings, 'subprogramPrefixes' | 'subprogramExtensions'>) {}

  // Ordered candidate names: every extension for the first prefix, then the next prefix
  candidates(program: string): string[] {
    const names: string[] = [];
    for (const prefix of this.settings.subprogramPrefixes) {
      for (const extension of this.settings.subprogramExtensions) {
        names.push(`${prefix}${program}${extension}`);
      }
    }
    return names;
  }

  // Absolute path of the first candidate that exists as a regular file
  locate(directory: string, program: string): string | undefined {
    for (const name of this.candidates(program)) {
      const candidate = path.resolve(directory, name);
      if (this.isFile(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  private isFile(candidate: string): boolean {
    const stats = fs.statSync(candidate, { throwIfNoEntry: false });
    return stats !== undefined && stats.isFile();
  }
}
