import type { DocumentModel, DocumentRepository, NewDocument } from '../../../models/Document';

const TIMESTAMP = '2023-04-05T12:00:00.000Z';

export function buildDocument(overrides: Partial<DocumentModel> = {}): DocumentModel {
  return {
    id: 4,
    title: 'Lease',
    correspondent: 'ACME',
    mime_type: 'application/pdf',
    checksum: 'abc',
    archive_checksum: null,
    storage_type: 'unencrypted',
    created: TIMESTAMP,
    added: TIMESTAMP,
    modified: TIMESTAMP,
    filename: null,
    archive_filename: null,
    original_filename: null,
    archive_serial_number: null,
    ...overrides,
  };
}

export function buildNewDocument(overrides: Partial<NewDocument> = {}): NewDocument {
  return {
    title: 'Lease',
    correspondent: null,
    mime_type: 'application/pdf',
    checksum: 'abc',
    archive_checksum: null,
    storage_type: 'unencrypted',
    filename: null,
    archive_filename: null,
    original_filename: null,
    archive_serial_number: null,
    ...overrides,
  };
}

export class InMemoryDocumentRepository implements DocumentRepository {
  constructor(private documents: DocumentModel[] = []) {}

  async create(doc: NewDocument): Promise<DocumentModel> {
    const created = buildDocument({
      ...doc,
      id: this.documents.length + 1,
      created: doc.created ?? TIMESTAMP,
    });
    this.documents.push(created);
    return created;
  }

  async findById(id: number): Promise<DocumentModel | null> {
    return this.documents.find((doc) => doc.id === id) ?? null;
  }

  async findAll(): Promise<DocumentModel[]> {
    return [...this.documents];
  }

  async update(
    id: number,
    updates: Partial<Omit<DocumentModel, 'id' | 'added' | 'modified'>>
  ): Promise<DocumentModel> {
    const index = this.documents.findIndex((doc) => doc.id === id);
    if (index === -1) {
      throw new Error(`Document ${id} not found`);
    }
    this.documents[index] = { ...this.documents[index], ...updates };
    return this.documents[index];
  }
}
