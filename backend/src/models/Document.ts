import type { Document, StorageType } from '@docshelf/shared/schemas/documents.zod';

export interface DocumentModel extends Document {
  id: number;
}

export type NewDocument = Omit<DocumentModel, 'id' | 'added' | 'modified' | 'created'> & {
  created?: string;
};

export interface DocumentRepository {
  create(doc: NewDocument): Promise<DocumentModel>;
  findById(id: number): Promise<DocumentModel | null>;
  findAll(): Promise<DocumentModel[]>;
  update(
    id: number,
    updates: Partial<Omit<DocumentModel, 'id' | 'added' | 'modified'>>
  ): Promise<DocumentModel>;
}

export const STORAGE_TYPE_GPG: StorageType = 'gpg';
export const STORAGE_TYPE_UNENCRYPTED: StorageType = 'unencrypted';
