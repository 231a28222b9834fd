/**
 * Text progress bar for the render view.
 */

const BAR_WIDTH = 30;

export function progressBar(done: number, total: number, width: number = BAR_WIDTH): string {
  const ratio = total > 0 ? Math.min(1, Math.max(0, done / total)) : 0;
  const filled = Math.round(ratio * width);
  return "█".repeat(filled) + "░".repeat(width - filled);
}
