/**
 * helm-values-lint - Helm Chart Detection
 *
 * Chart.yaml からチャート名を読み取る（表示用のみ）
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * 指定ディレクトリがHelm Chartかどうかを判定
 *
 * @param directory - チェックするディレクトリパス
 * @returns Chart.yaml がある場合true
 */
export async function isHelmChart(directory: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path.join(directory, 'Chart.yaml'));
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Chart.yamlからチャート名を取り出す
 *
 * YAMLパーサーは使わず、トップレベルの `name:` 行だけを読む。
 * Helmテンプレート構文（{{ }}）を含む行は無視する。
 *
 * @param content - Chart.yamlの内容
 * @returns チャート名、name がなければ undefined
 *
 * @example
 * parseChartName('apiVersion: v2\nname: my-app\nversion: 1.2.0');
 * // => 'my-app'
 */
export function parseChartName(content: string): string | undefined {
  let name: string | undefined;

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#') || trimmed.includes('{{')) {
      continue;
    }

    const match = line.match(/^name:\s*(.+)$/);
    if (match) {
      // クォート除去
      name = (match[1] ?? '').trim().replace(/^["']|["']$/g, '');
    }
  }

  return name || undefined;
}

/**
 * チャートルートの Chart.yaml からチャート名を読み込む
 *
 * @param rootDir - チャートのルートディレクトリ
 * @returns チャート名。Chart.yaml がない場合は undefined
 */
export async function readChartName(rootDir: string): Promise<string | undefined> {
  if (!(await isHelmChart(rootDir))) {
    return undefined;
  }

  const content = await fs.readFile(path.join(rootDir, 'Chart.yaml'), 'utf-8');
  return parseChartName(content);
}
