import { input } from '@inquirer/prompts';

// Единственное чтение stdin: ждём Enter перед выходом. Введённое значение не используется.
export async function waitForEnter(): Promise<void> {
  try {
    await input({ message: 'Нажмите Enter для завершения...' });
  } catch (error) {
    // Ctrl+C во время паузы — обычное завершение.
    if (error instanceof Error && error.name === 'ExitPromptError') {
      return;
    }
    throw error;
  }
}
