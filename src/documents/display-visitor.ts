import type { DocumentVisitor } from './types.js';

// Посетитель, выводящий сообщение о показе содержимого для каждого варианта.
export class DisplayVisitor implements DocumentVisitor {
  visitPdf(): void {
    console.log('[Visitor] Displaying PDF content.');
  }

  visitTxt(): void {
    console.log('[Visitor] Displaying TXT content.');
  }
}
