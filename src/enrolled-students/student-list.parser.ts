export type ParsedStudent = { fullName: string; email: string };

export type StudentListOptions = {
  rollPrefixes: string[];
  emailDomain: string;
};

/**
 * Reads a pasted class list, one student per line:
 *
 *   Asha Rao        bmat2301   A
 *   Vikram Singh    rs_math07
 *
 * The first word starting with a known roll prefix is the roll number; words
 * before it are the name and anything after it is ignored. Lines without a roll
 * number are skipped.
 */
export function parseStudentList(raw: string, options: StudentListOptions): ParsedStudent[] {
  const prefixes = options.rollPrefixes.map((p) => p.trim().toLowerCase()).filter(Boolean);
  const result: ParsedStudent[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const words = line.trim().split(/\s+/).filter(Boolean);
    const rollIndex = words.findIndex((word) =>
      prefixes.some((prefix) => word.toLowerCase().startsWith(prefix)),
    );
    if (rollIndex <= 0) continue;
    result.push({
      fullName: words.slice(0, rollIndex).join(' '),
      email: `${words[rollIndex].toLowerCase()}@${options.emailDomain}`,
    });
  }
  return result;
}
