/**
 * Materialize a set of files into an isolated working directory.
 *
 * The strategy is picked once per directory by probing whether symlinks can
 * be created there; files are then linked, or copied when linking is not
 * available.
 */

import * as fs from 'fs';
import * as path from 'path';

export type StagingStrategy = 'symlink' | 'copy';

export interface StagingResult {
  staged: string[];
  strategy: StagingStrategy;
  missing: number;
  collisions: number;
}

const PROBE_NAME = '.staging-probe';

export function detectStagingStrategy(stagingDir: string): StagingStrategy {
  const target = path.join(stagingDir, `${PROBE_NAME}-target`);
  const link = path.join(stagingDir, `${PROBE_NAME}-link`);

  fs.writeFileSync(target, '');
  try {
    fs.symlinkSync(target, link);
    fs.rmSync(link, { force: true });
    return 'symlink';
  } catch {
    return 'copy';
  } finally {
    fs.rmSync(target, { force: true });
  }
}

function materialize(source: string, destination: string, strategy: StagingStrategy): void {
  if (strategy === 'symlink') {
    fs.symlinkSync(path.resolve(source), destination);
  } else {
    fs.copyFileSync(source, destination);
  }
}

/**
 * Stage each existing file under its base name. Missing sources and base
 * names already staged are skipped.
 */
export function stageFiles(files: string[], stagingDir: string, strategy?: StagingStrategy): StagingResult {
  fs.mkdirSync(stagingDir, { recursive: true });
  const chosen = strategy ?? detectStagingStrategy(stagingDir);

  const result: StagingResult = { staged: [], strategy: chosen, missing: 0, collisions: 0 };
  const names = new Set<string>();

  for (const file of files) {
    const source = file.trim();
    if (!source || !fs.existsSync(source)) {
      result.missing++;
      continue;
    }

    const name = path.basename(source);
    if (names.has(name)) {
      result.collisions++;
      continue;
    }

    const destination = path.join(stagingDir, name);
    materialize(source, destination, chosen);
    names.add(name);
    result.staged.push(destination);
  }

  return result;
}
