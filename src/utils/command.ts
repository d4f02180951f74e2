export interface CommandLine {
  command: string;
  args: string[];
}

/**
 * Split a `--target` string into the executable and its arguments. Single
 * quotes are literal, double quotes honour backslash escapes, and a quoted
 * part joins the word around it (`--name="calc server"` is one argument).
 * An unterminated quote runs to the end of the line.
 */
export function splitCommandLine(line: string): CommandLine {
  const words: string[] = [];
  let word = '';
  let inWord = false;
  let quote = '';

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);

    if (quote) {
      if (char === quote) {
        quote = '';
      } else if (char === '\\' && quote === '"' && i + 1 < line.length) {
        word += line.charAt(++i);
      } else {
        word += char;
      }
      continue;
    }

    if (char === ' ' || char === '\t' || char === '\n') {
      if (inWord) words.push(word);
      word = '';
      inWord = false;
      continue;
    }

    inWord = true;
    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === '\\' && i + 1 < line.length) {
      word += line.charAt(++i);
    } else {
      word += char;
    }
  }

  if (inWord) words.push(word);

  const [command = '', ...args] = words;
  return { command, args };
}
