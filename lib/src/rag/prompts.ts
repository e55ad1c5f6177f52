/**
 * Guide Prompts and Fixed Replies
 */

import type { Language } from '../knowledge-base/index.js';

// =============================================================================
// System Prompts
// =============================================================================

export const SYSTEM_PROMPTS: Record<Language, string> = {
  id: [
    'Anda adalah pemandu virtual museum Reog Ponorogo yang ramah dan berpengetahuan luas.',
    '',
    'TUGAS ANDA:',
    '- Menjawab pertanyaan pengunjung tentang Reog Ponorogo',
    '- Gunakan HANYA informasi dari konteks yang diberikan',
    '- Berikan jawaban yang informatif namun ringkas (2-4 kalimat)',
    '- Bersikap ramah dan antusias tentang budaya Reog',
    '',
    'ATURAN PENTING:',
    '1. Jika informasi tidak ada dalam konteks, katakan "Maaf, saya tidak memiliki informasi tentang hal tersebut dalam basis pengetahuan saya."',
    '2. Jangan mengarang atau menambahkan informasi yang tidak ada di konteks',
    '3. Gunakan Bahasa Indonesia yang jelas dan mudah dipahami',
    '4. Fokus pada informasi yang paling relevan dengan pertanyaan',
    '5. Jangan memulai jawaban dengan sapaan pembuka',
  ].join('\n'),
  en: [
    'You are a friendly and knowledgeable Reog Ponorogo virtual museum guide.',
    '',
    'YOUR TASK:',
    "- Answer visitors' questions about Reog Ponorogo",
    '- Use ONLY information from the provided context',
    '- Provide informative yet concise answers (2-4 sentences)',
    '- Be friendly and enthusiastic about Reog culture',
    '',
    'IMPORTANT RULES:',
    `1. If information is not in the context, say "I'm sorry, I don't have information about that in my knowledge base."`,
    '2. Do not make up or add information not present in the context',
    '3. Use clear and easy-to-understand English',
    '4. Focus on information most relevant to the question',
    "5. Don't start your answer with an opening greeting",
  ].join('\n'),
};

// =============================================================================
// User Prompt
// =============================================================================

/**
 * @example
 * ```typescript
 * buildUserPrompt('Siapa Warok?', '[Dokumen 1: Warok (tokoh)]\nWarok adalah ...', 'id');
 * // 'Konteks informasi:\n[Dokumen 1: ...]\n\nPertanyaan pengunjung: Siapa Warok?\n\nJawaban (dalam 2-4 kalimat):'
 * ```
 */
export function buildUserPrompt(question: string, context: string, language: Language): string {
  if (language === 'en') {
    return `Context information:\n${context}\n\nVisitor question: ${question}\n\nAnswer (in 2-4 sentences):`;
  }
  return `Konteks informasi:\n${context}\n\nPertanyaan pengunjung: ${question}\n\nJawaban (dalam 2-4 kalimat):`;
}

/**
 * Lead-ins the model tends to echo from the prompt, stripped in this order
 */
export const ANSWER_PREFIXES: Record<Language, readonly string[]> = {
  id: ['Jawaban:', 'Jawab:', 'Berdasarkan konteks,'],
  en: ['Answer:', 'Based on the context,'],
};

// =============================================================================
// Fixed Replies
// =============================================================================

export const NO_INFORMATION_REPLIES: Record<Language, string> = {
  id: 'Maaf, saya tidak menemukan informasi yang relevan untuk menjawab pertanyaan Anda di basis pengetahuan saya tentang Reog Ponorogo.',
  en: "I'm sorry, I couldn't find relevant information to answer your question in my knowledge base about Reog Ponorogo.",
};

export const ERROR_REPLIES: Record<Language, string> = {
  id: 'Maaf, terjadi kesalahan saat memproses pertanyaan Anda. Silakan coba lagi.',
  en: "I'm sorry, there was an error processing your question. Please try again.",
};
