import {
  DEFAULT_FALLBACK,
  QUESTION_FALLBACK,
  RESTAURANT_RESPONSES,
  type ChatKeyword,
} from "@textbook/config";

/**
 * Match user input against the keyword table.
 *
 * Input is lower-cased and the first keyword (in table order) that appears
 * anywhere in it wins, so "this" matches "hi". Unmatched questions get the
 * phone-number fallback, anything else the default reply.
 */
export function getResponse(userInput: string, table: ChatKeyword[] = RESTAURANT_RESPONSES): string {
  const input = userInput.toLowerCase();

  const match = table.find(({ keyword }) => input.includes(keyword));
  if (match) {
    return match.response;
  }

  if (input.includes("?")) {
    return QUESTION_FALLBACK;
  }

  return DEFAULT_FALLBACK;
}
