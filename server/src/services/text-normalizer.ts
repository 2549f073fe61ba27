const LATIN = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
const VIETNAMESE =
  "àáảãạăằắẳẵặâầấẩẫậèéẻẽẹêềếểễệđìíỉĩịòóỏõọôồốổỗộơờớởỡợùúủũụưừứửữựỳỵỷỹý";
const PUNCTUATION = " .,!?'@$%&/:;()";

const ALLOWED = new Set([...LATIN, ...VIETNAMESE, ...VIETNAMESE.toUpperCase(), ...PUNCTUATION]);

/**
 * Reduces text to characters the speech model can read. Lines become
 * sentences, unsupported characters become spaces, `; : ( )` become commas
 * and the result always ends in terminal punctuation.
 */
export function normalizeText(input: string): string {
  let text = input;

  if (text.includes("\n")) {
    text = text
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean)
      .map((line) => (line.endsWith(".") ? line : `${line}.`))
      .join(" ");
  }

  text = Array.from(text, (char) => (ALLOWED.has(char) ? char : " "))
    .join("")
    .trim()
    .replace(/[;:()]/g, ",")
    .replace(/\.+/g, ".")
    .replace(/,+/g, ",")
    .replace(/\s+/g, " ");

  if (!/[.?!,]$/.test(text)) {
    text += ".";
  }

  return text;
}
