import type { DocumentTypeLabel } from '../documents/types.js';

/**
 * Звено цепочки проверок (Chain of Responsibility).
 *
 * Звено выполняет свою проверку; при неудаче цепочка обрывается с false,
 * при успехе запрос передаётся следующему звену, а последнее звено
 * возвращает true. Циклы не проверяются — их создание является ошибкой вызывающего.
 */
export abstract class Handler {
  private next: Handler | null = null;

  // Устанавливает (или молча заменяет) следующее звено и возвращает его.
  setNext(handler: Handler): Handler {
    this.next = handler;
    return handler;
  }

  handle(label: DocumentTypeLabel): boolean {
    if (!this.check(label)) {
      return false;
    }
    if (this.next) {
      return this.next.handle(label);
    }
    return true;
  }

  // Локальная проверка звена; сообщения выводит сама.
  protected abstract check(label: DocumentTypeLabel): boolean;
}
