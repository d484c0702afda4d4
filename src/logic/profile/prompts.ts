export const profilePrompt = (record: string) => `Extract the student's details from this record.

RECORD:
"""
${record}
"""

Return ONLY a JSON object, nothing else, with exactly these keys:
{"name": string, "diagnosis": string, "grade": string, "iep_date": string}
Use "Unknown" for a missing name, "Not Found" for a missing diagnosis and "N/A" for a missing grade or date.`;
