/**
 * helm-values-lint - File System Utils
 *
 * テンプレートファイルの列挙と読み込み (Node.js標準API + fast-glob)
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import fg from 'fast-glob';
import { ConfigurationError, errorMessage } from '@/errors';

// fatal: true で不正なUTF-8バイト列をエラーにする
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * 拡張子の許可リストでファイルを再帰的に検索
 *
 * 結果はルートからの相対パスで昇順ソートされるため、列挙順は実行ごとに同じ。
 *
 * @param rootDir - 検索開始ディレクトリ
 * @param extensions - 許可する拡張子（例: ['.yaml', '.tpl']）。大文字小文字は区別しない
 * @param ignore - 除外パターン
 * @returns 絶対パスの配列
 * @throws ConfigurationError ディレクトリを走査できない場合（権限不足など）
 *
 * @example
 * const files = await findFilesByExtension('/charts/app', ['.yaml', '.tpl'], []);
 * // => ['/charts/app/templates/_helpers.tpl', '/charts/app/templates/deployment.yaml']
 */
export async function findFilesByExtension(
  rootDir: string,
  extensions: readonly string[],
  ignore: readonly string[]
): Promise<string[]> {
  const patterns = extensions.map(ext => `**/*${ext}`);
  let files: string[];
  try {
    files = await fg(patterns, {
      cwd: rootDir,
      ignore: [...ignore],
      onlyFiles: true,
      dot: true,
      caseSensitiveMatch: false,
    });
  } catch (error) {
    throw new ConfigurationError(`Cannot list files under ${rootDir}: ${errorMessage(error)}`);
  }

  // 重複を除去
  const uniqueFiles = [...new Set(files)];
  uniqueFiles.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  return uniqueFiles.map(file => path.join(rootDir, file));
}

/**
 * ファイルをUTF-8として厳密に読み込む
 *
 * 読み込み失敗・デコード失敗のどちらでも例外を投げる。
 *
 * @param filePath - ファイルパス
 * @returns ファイル内容
 */
export async function readTextFile(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);
  return utf8Decoder.decode(buffer);
}

/**
 * ファイルが存在するかチェック
 *
 * @param filePath - ファイルパス
 * @returns 存在し、通常ファイルの場合はtrue
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * ディレクトリが存在するかチェック
 *
 * @param dirPath - ディレクトリパス
 * @returns 存在し、ディレクトリの場合はtrue
 *
 * @example
 * if (await directoryExists('/Users/test/chart')) { ... }
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * パスが何らかの形で存在するかチェック
 */
export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}
