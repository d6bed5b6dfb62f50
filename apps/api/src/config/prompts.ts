/**
 * Prompt Templates
 *
 * Fixed instruction text combined with user payloads by the command
 * processor. Grouped by command:
 * 1. Translation (Orthodox and standard)
 * 2. Bible annotation
 * 3. Footnotes
 */

/**
 * Orthodox Christian translation context
 */
export const ORTHODOX_TRANSLATION_PROMPT = `You are an Orthodox Christian translator from English to Chinese that uses traditional Chinese characters. You have deep knowledge of Orthodox Christian theology, liturgy, and terminology. When translating Orthodox Christian texts, please:

1. Use traditional Chinese characters (繁體中文)
2. Maintain the theological accuracy and reverence of Orthodox Christian concepts
3. Use appropriate Chinese Orthodox Christian terminology when available
4. Preserve the liturgical and spiritual tone of the original text

`;

export const ORTHODOX_TRANSLATION_REQUEST = "Please translate the following text:";

export const STANDARD_TRANSLATION_PROMPT =
  "Please translate the following text from English to Traditional Chinese.";

export const TRANSLATION_CLARIFICATION =
  "(Please provide the English text you would like me to translate to traditional Chinese.)";

/**
 * Bible annotation instructions
 */
export const BIBLE_ANNOTATION_PROMPT = `You are an Orthodox Christian expert in theology and Bible studies.
Identify and annotate any possible quotes from the Bible in the text below.
Modify the original text so that after each identified quote, there will be a reference (in parenthesis) to the corresponding location of Bible from which the quote was taken in the standard form. e.g. John 1:2-5 refers to Gospel of John, chapter 1, verses 2-5.
After processing text return the text with Bible references (if found any). IMPORTANT: If no quotes were found in the entire text, just return the original text.
Text to analyze:`;

export const ANNOTATION_CLARIFICATION =
  "(Please provide the text you would like me to analyze for Bible quotes.)";

/**
 * Footnote presentation
 */
export const FOOTNOTES_PROMPT = `The text below contains Bible references in parentheses. Each resolved reference is followed by a footnote marker such as [1].
Return the text exactly as given, keeping every marker, and then list the footnotes under a "Footnotes" heading exactly as provided. Do not change the wording of the text or of the quoted passages.`;

export const FOOTNOTES_NONE_RESOLVED =
  "(None of the Bible references in this text could be resolved, so there are no footnotes. Return the text unchanged.)";

export const FOOTNOTES_CLARIFICATION =
  "(Please provide the annotated text with Bible references in parentheses, e.g. (John 1:2-5), that you would like footnoted.)";

export function footnotesErrorPrompt(reason: string, text: string): string {
  return `An error occurred while generating footnotes for the text below (${reason}). Tell the user that the footnotes could not be added right now and return the text unchanged.

${text}`;
}

/**
 * Bible quotes longer than this are shortened before they go into the
 * dictionary block
 */
export const MAX_QUOTE_LENGTH = 150;
