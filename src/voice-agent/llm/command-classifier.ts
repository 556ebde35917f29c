/**
 * Command Classifier
 *
 * Decides whether an utterance is an actionable command or conversation.
 * The default policy is a case-insensitive substring match against a fixed
 * keyword list, so "running late" counts as a command.
 */

export const DEFAULT_COMMAND_KEYWORDS: readonly string[] = [
  "open",
  "launch",
  "execute",
  "run",
  "shutdown",
];

/**
 * Replaceable classification policy
 */
export interface CommandClassifier {
  classify(text: string): boolean;
}

/**
 * Keyword match result, for logging
 */
export interface KeywordMatch {
  matched: boolean;
  keyword?: string;
}

/**
 * Keyword-based command detector
 */
export class KeywordCommandClassifier implements CommandClassifier {
  private keywords: readonly string[];

  constructor(keywords: readonly string[] = DEFAULT_COMMAND_KEYWORDS) {
    this.keywords = keywords.map((k) => k.trim().toLowerCase()).filter((k) => k.length > 0);
  }

  /**
   * First keyword found in `text`, in list order
   */
  match(text: string): KeywordMatch {
    const lowerText = text.toLowerCase();
    const keyword = this.keywords.find((k) => lowerText.includes(k));
    return keyword === undefined ? { matched: false } : { matched: true, keyword };
  }

  classify(text: string): boolean {
    const result = this.match(text);
    if (result.matched) {
      console.debug(`[CommandClassifier] Detected keyword '${result.keyword}' in '${text.toLowerCase()}'`);
    } else {
      console.debug(`[CommandClassifier] No command keyword found in '${text.toLowerCase()}'`);
    }
    return result.matched;
  }

  getKeywords(): readonly string[] {
    return this.keywords;
  }
}

export function createCommandClassifier(
  keywords: readonly string[] = DEFAULT_COMMAND_KEYWORDS
): KeywordCommandClassifier {
  return new KeywordCommandClassifier(keywords);
}
