import fs from 'fs/promises';
import * as openpgp from 'openpgp';
import { loadConfig } from '../../config/env';
import {
  STORAGE_TYPE_GPG,
  STORAGE_TYPE_UNENCRYPTED,
  type DocumentModel,
  type DocumentRepository,
} from '../../models/Document';
import { ConfigurationError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { getDocumentPaths, type DocumentPaths } from './DocumentPaths';
import { getDocumentStore } from './DocumentStore';
import { exists, writeFileCreatingDirs } from './files';

const GPG_SUFFIX = '.gpg';
const HTTP_STATUS_BAD_REQUEST = 400;

async function decryptContent(encrypted: Uint8Array, passphrase: string): Promise<Uint8Array> {
  const message = await openpgp.readMessage({ binaryMessage: encrypted });
  const { data } = await openpgp.decrypt({ message, passwords: [passphrase], format: 'binary' });
  return data;
}

/**
 * Converts documents stored encrypted with a passphrase back to plain
 * files: originals and thumbnails lose their .gpg suffix and the record
 * switches to unencrypted storage.
 */
export class DocumentDecrypter {
  constructor(
    private repository: DocumentRepository,
    private paths: DocumentPaths,
    private passphrase: string | undefined
  ) {}

  async decryptAll(): Promise<number[]> {
    const passphrase = this.requirePassphrase();
    const decrypted: number[] = [];

    for (const doc of await this.repository.findAll()) {
      if (doc.storage_type !== STORAGE_TYPE_GPG) {
        continue;
      }
      if (await this.decrypt(doc, passphrase)) {
        decrypted.push(doc.id);
      }
    }

    logger.info(`Decrypted ${decrypted.length} documents`);
    return decrypted;
  }

  private async decrypt(doc: DocumentModel, passphrase: string): Promise<DocumentModel | null> {
    if (doc.filename !== null && !doc.filename.endsWith(GPG_SUFFIX)) {
      logger.error(`Document ${doc.id} is stored encrypted but ${doc.filename} has no ${GPG_SUFFIX} suffix, skipping`);
      return null;
    }

    const plain: DocumentModel = {
      ...doc,
      storage_type: STORAGE_TYPE_UNENCRYPTED,
      filename: doc.filename === null ? null : doc.filename.slice(0, -GPG_SUFFIX.length),
    };

    const files = [{ from: this.paths.sourcePath(doc), to: this.paths.sourcePath(plain) }];
    const thumbnail = this.paths.thumbnailPath(doc);
    if (await exists(thumbnail)) {
      files.push({ from: thumbnail, to: this.paths.thumbnailPath(plain) });
    } else {
      logger.warn(`Document ${doc.id} has no thumbnail to decrypt`);
    }

    // Decrypt everything before writing so a wrong passphrase leaves the
    // files untouched.
    const decrypted = await Promise.all(
      files.map(async (file) => ({
        ...file,
        content: await decryptContent(await fs.readFile(file.from), passphrase),
      }))
    );

    for (const file of decrypted) {
      await writeFileCreatingDirs(file.to, file.content);
      await fs.rm(file.from);
    }

    logger.debug(`Document ${doc.id} decrypted`);
    return this.repository.update(doc.id, {
      storage_type: plain.storage_type,
      filename: plain.filename,
    });
  }

  private requirePassphrase(): string {
    if (!this.passphrase) {
      throw new ConfigurationError(
        'PASSPHRASE is not set, cannot decrypt documents',
        HTTP_STATUS_BAD_REQUEST
      );
    }
    return this.passphrase;
  }
}

let documentDecrypter: DocumentDecrypter | null = null;

export function getDocumentDecrypter(): DocumentDecrypter {
  if (!documentDecrypter) {
    documentDecrypter = new DocumentDecrypter(
      getDocumentStore(),
      getDocumentPaths(),
      loadConfig().PASSPHRASE
    );
  }
  return documentDecrypter;
}
