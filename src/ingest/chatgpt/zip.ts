/**
 * ZIP reading module for ChatGPT exports
 * Reads conversations.json straight out of an export archive
 */

import { basename } from 'path';
import { text } from 'stream/consumers';
import yauzl from 'yauzl';

export const CONVERSATIONS_FILE = 'conversations.json';

/**
 * Check if a file is a ZIP file by extension
 */
export function isZipFile(filePath: string): boolean {
  return filePath.toLowerCase().endsWith('.zip');
}

/**
 * Open a ZIP file and return a yauzl ZipFile instance
 */
function openZipFile(zipPath: string): Promise<yauzl.ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(zipPath, { lazyEntries: true }, (err, zipFile) => {
      if (err) reject(err);
      else if (zipFile) resolve(zipFile);
      else reject(new Error('Failed to open ZIP file'));
    });
  });
}

/**
 * Read a single entry as UTF-8 text
 */
function readEntryText(zipFile: yauzl.ZipFile, entry: yauzl.Entry): Promise<string> {
  return new Promise((resolve, reject) => {
    zipFile.openReadStream(entry, (err, readStream) => {
      if (err) {
        reject(err);
        return;
      }
      if (!readStream) {
        reject(new Error('Failed to open read stream'));
        return;
      }
      text(readStream).then(resolve, reject);
    });
  });
}

/**
 * Whether a ZIP entry is the export's conversations.json
 * Directories and macOS metadata are never a match
 */
export function isConversationsEntry(fileName: string): boolean {
  if (fileName.endsWith('/') || fileName.includes('__MACOSX')) return false;
  return basename(fileName) === CONVERSATIONS_FILE;
}

/**
 * Read the first conversations.json found in a ZIP export, at any depth
 * @throws Error when the archive holds no conversations.json
 */
export async function readConversationsJson(zipPath: string): Promise<string> {
  const zipFile = await openZipFile(zipPath);
  let content: string | null = null;

  return new Promise((resolve, reject) => {
    const fail = (err: unknown): void => {
      if (zipFile.isOpen) zipFile.close();
      reject(err);
    };

    zipFile.on('error', fail);

    zipFile.on('entry', (entry: yauzl.Entry) => {
      if (content !== null || !isConversationsEntry(entry.fileName)) {
        zipFile.readEntry();
        return;
      }

      readEntryText(zipFile, entry).then((entryText) => {
        content = entryText;
        zipFile.readEntry();
      }, fail);
    });

    zipFile.on('end', () => {
      if (content === null) {
        reject(new Error(`${CONVERSATIONS_FILE} not found in ZIP file: ${zipPath}`));
      } else {
        resolve(content);
      }
    });

    // Start reading entries
    zipFile.readEntry();
  });
}
