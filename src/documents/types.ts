// Метка типа документа ("PDF", "TXT", "DOCX", ...). Сравнивается только на равенство.
export type DocumentTypeLabel = string;

// Метки, которые по умолчанию принимает проверка формата.
export const KNOWN_DOCUMENT_TYPES = ['PDF', 'TXT', 'DOCX'] as const;

// Элемент структуры: сообщает свою метку и принимает посетителя.
export interface Document {
  getType(): DocumentTypeLabel;
  accept<R>(visitor: DocumentVisitor<R>): R;
}

// Посетитель перечисляет все варианты документов.
// Новый вариант требует нового метода здесь — и во всех посетителях.
export interface DocumentVisitor<R = void> {
  visitPdf(document: PDFDocument): R;
  visitTxt(document: TXTDocument): R;
}

// Варианты документов — без состояния, только метка.
export class PDFDocument implements Document {
  getType(): 'PDF' {
    return 'PDF';
  }

  accept<R>(visitor: DocumentVisitor<R>): R {
    return visitor.visitPdf(this);
  }
}

export class TXTDocument implements Document {
  getType(): 'TXT' {
    return 'TXT';
  }

  accept<R>(visitor: DocumentVisitor<R>): R {
    return visitor.visitTxt(this);
  }
}
