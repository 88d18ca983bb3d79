export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** Escapes model output for Telegram HTML mode and turns `**bold**` into `<b>bold</b>`. */
export function markdownToTelegramHtml(text: string): string {
  const parts = escapeHtml(text).split('**');
  // An odd part count means every ** was paired; otherwise the last one stays literal.
  const paired = parts.length % 2 === 1 ? parts.length : parts.length - 1;

  let html = '';
  for (let i = 0; i < parts.length; i++) {
    if (i >= paired) html += `**${parts[i]}`;
    else html += i % 2 === 1 ? `<b>${parts[i]}</b>` : parts[i];
  }
  return html;
}
