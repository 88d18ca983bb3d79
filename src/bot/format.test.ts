import { describe, expect, it } from 'vitest';
import { escapeHtml, markdownToTelegramHtml } from './format';

describe('escapeHtml', () => {
  it('escapes the characters Telegram HTML reserves', () => {
    expect(escapeHtml('a < b & c > d')).toBe('a &lt; b &amp; c &gt; d');
  });
});

describe('markdownToTelegramHtml', () => {
  it('converts bold after escaping', () => {
    expect(markdownToTelegramHtml('**Sleep** was <short>')).toBe('<b>Sleep</b> was &lt;short&gt;');
  });

  it('leaves an unpaired marker as text', () => {
    expect(markdownToTelegramHtml('a **b** c **d')).toBe('a <b>b</b> c **d');
  });

  it('passes plain text through', () => {
    expect(markdownToTelegramHtml('Rest well tonight.')).toBe('Rest well tonight.');
  });
});
