/**
 * Quote Wrapper
 * Wraps runs of `&gt;`-quoted lines in already-escaped, `<br>`-joined HTML.
 */

export const QUOTE_CLASS = 'email-quote';

const ESCAPED_MARKER = '&gt;';
const LINE_BREAK = '<br>';

function stripQuoteMarker(line: string): string {
  if (line.startsWith(`${ESCAPED_MARKER} `)) {
    return line.slice(ESCAPED_MARKER.length + 1);
  }
  return line.slice(ESCAPED_MARKER.length);
}

/**
 * Each maximal run of consecutive lines starting with `&gt;` loses one
 * marker layer and is wrapped in `<div class="email-quote">`. A single
 * unquoted line (blank lines included) ends a run.
 *
 * @example
 * wrapQuotedBlocks('Hi<br>&gt; one<br>&gt; two')
 * // 'Hi<br><div class="email-quote">one<br>two</div>'
 */
export function wrapQuotedBlocks(html: string): string {
  if (!html) {
    return '';
  }

  const lines = html.split(LINE_BREAK);
  const output: string[] = [];
  let run: string[] = [];

  const flush = () => {
    if (run.length > 0) {
      output.push(`<div class="${QUOTE_CLASS}">${run.join(LINE_BREAK)}</div>`);
      run = [];
    }
  };

  for (const line of lines) {
    if (line.startsWith(ESCAPED_MARKER)) {
      run.push(stripQuoteMarker(line));
    } else {
      flush();
      output.push(line);
    }
  }
  flush();

  return output.join(LINE_BREAK);
}
