import { StorageTypeEnum } from '@docshelf/shared/schemas/documents.zod';
import { all, get, run } from '../../db/connection';
import type { DocumentModel, DocumentRepository, NewDocument } from '../../models/Document';
import { NotFoundError } from '../../utils/errors';

const SELECT_DOCUMENT_BY_ID_QUERY = 'SELECT * FROM documents WHERE id = ?';
const SELECT_ALL_DOCUMENTS_QUERY = 'SELECT * FROM documents ORDER BY created DESC, id DESC';
const INSERT_DOCUMENT_QUERY = `
  INSERT INTO documents (
    title, correspondent, mime_type, checksum, archive_checksum, storage_type,
    created, added, modified, filename, archive_filename, original_filename,
    archive_serial_number
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

const UPDATABLE_COLUMNS = [
  'title',
  'correspondent',
  'mime_type',
  'checksum',
  'archive_checksum',
  'storage_type',
  'created',
  'filename',
  'archive_filename',
  'original_filename',
  'archive_serial_number',
] as const;

interface DocumentRow {
  id: number;
  title: string;
  correspondent: string | null;
  mime_type: string;
  checksum: string;
  archive_checksum: string | null;
  storage_type: string;
  created: string;
  added: string;
  modified: string;
  filename: string | null;
  archive_filename: string | null;
  original_filename: string | null;
  archive_serial_number: number | null;
}

function parseDocumentFromRow(row: DocumentRow): DocumentModel {
  return {
    ...row,
    storage_type: StorageTypeEnum.parse(row.storage_type),
  };
}

export class DocumentStore implements DocumentRepository {
  async create(doc: NewDocument): Promise<DocumentModel> {
    const now = new Date().toISOString();

    const { lastID } = await run(INSERT_DOCUMENT_QUERY, [
      doc.title,
      doc.correspondent,
      doc.mime_type,
      doc.checksum,
      doc.archive_checksum,
      doc.storage_type,
      doc.created ?? now,
      now,
      now,
      doc.filename,
      doc.archive_filename,
      doc.original_filename,
      doc.archive_serial_number,
    ]);

    return this.getById(lastID);
  }

  async findById(id: number): Promise<DocumentModel | null> {
    const row = await get<DocumentRow>(SELECT_DOCUMENT_BY_ID_QUERY, [id]);
    return row ? parseDocumentFromRow(row) : null;
  }

  async findAll(): Promise<DocumentModel[]> {
    const rows = await all<DocumentRow>(SELECT_ALL_DOCUMENTS_QUERY);
    return rows.map(parseDocumentFromRow);
  }

  async update(
    id: number,
    updates: Partial<Omit<DocumentModel, 'id' | 'added' | 'modified'>>
  ): Promise<DocumentModel> {
    const columns = UPDATABLE_COLUMNS.filter((column) => updates[column] !== undefined);
    const assignments = [...columns.map((column) => `${column} = ?`), 'modified = ?'];
    const params = [
      ...columns.map((column) => updates[column]),
      new Date().toISOString(),
      id,
    ];

    const { changes } = await run(
      `UPDATE documents SET ${assignments.join(', ')} WHERE id = ?`,
      params
    );
    if (changes === 0) {
      throw new NotFoundError(`Document ${id} not found`);
    }

    return this.getById(id);
  }

  private async getById(id: number): Promise<DocumentModel> {
    const doc = await this.findById(id);
    if (!doc) {
      throw new NotFoundError(`Document ${id} not found`);
    }
    return doc;
  }
}

let documentStore: DocumentStore | null = null;

export function getDocumentStore(): DocumentStore {
  if (!documentStore) {
    documentStore = new DocumentStore();
  }
  return documentStore;
}
