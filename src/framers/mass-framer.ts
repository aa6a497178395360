// src/framers/mass-framer.ts

/**
 * Общий интерфейс для упаковки и разбора кадров протокола
 */
export interface MassFramer {
  /**
   * Оборачивает тело сообщения в заголовок кадра
   */
  buildFrame(payload: Uint8Array): Uint8Array;

  /**
   * Извлекает тело из сырого кадра, проверяя заявленную длину
   */
  parseFrame(frame: Uint8Array): Uint8Array;
}
