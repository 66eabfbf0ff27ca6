import type { Topic } from './types.js';

const QUESTION_SET_SHAPE = '{"all_questions": [{"skill": "...", "questions": ["question1", "question2", ...]}]}';

function describeTopics(topics: readonly Topic[]): string {
  return topics.length === 1 ? `this skill: ${topics[0]}` : `these skills: ${topics.join(', ')}`;
}

export const GENERATION_SYSTEM_PROMPT =
  'You are a senior technical interviewer. You write precise interview questions and answer with JSON only.';

export const EXTRACTION_SYSTEM_PROMPT =
  'You analyse resumes for technical interview preparation and answer with JSON only.';

export const DISCOVERY_SYSTEM_PROMPT =
  'You are an expert technical researcher preparing briefing notes for interviewers.';

export function buildContextPrompt(topics: readonly Topic[], context: string): string {
  return [
    `Generate insightful, technical interview questions for ${describeTopics(topics)}.`,
    'Use the provided technical context:',
    context,
    '',
    'Focus on conceptual understanding, analysis and comparison, and real-world applications.',
    'Questions should reveal deep technical knowledge.',
    '',
    'Return ONLY a JSON object with this structure:',
    QUESTION_SET_SHAPE,
  ].join('\n');
}

export function buildContextFreePrompt(topics: readonly Topic[]): string {
  return [
    `Generate verbal technical interview questions for ${describeTopics(topics)}.`,
    '',
    'Guidelines:',
    '- Test conceptual understanding, not syntax or code.',
    '- Ask about trade-offs, use cases and design decisions.',
    '- Avoid questions that need a specific implementation or library API.',
    '- Every question must work in a spoken interview.',
    "- Prefer 'what', 'why', 'when' and 'how' over implementation detail.",
    '',
    'Return ONLY a JSON object with this structure:',
    QUESTION_SET_SHAPE,
  ].join('\n');
}

export function buildTopicExtractionPrompt(documentText: string, topicCount: number): string {
  return [
    `Analyse the resume below and extract exactly ${topicCount} technical skills.`,
    '',
    'Criteria:',
    '- Prefer foundational concepts over individual tools.',
    "- Take skills from what the candidate lists; do not infer generic activities.",
    '- Each skill must support an in-depth conceptual discussion.',
    '- Cover the breadth of the resume and avoid near-duplicates.',
    '- Leave out soft skills and vague terms.',
    '',
    'Resume text:',
    documentText,
    '',
    'Return ONLY a JSON object with this structure:',
    '{"skills": ["skill1", "skill2", ...]}',
  ].join('\n');
}

/** Search query hint handed to the research model for one topic. */
export function buildSearchQuery(topic: Topic): string {
  return `"${topic}" interview questions concepts trade-offs -youtube -course`;
}

export function buildDiscoveryPrompt(topics: readonly Topic[]): string {
  const topicLines = topics.map((topic) => `- Skill: ${topic} -> Query: ${buildSearchQuery(topic)}`);
  return [
    'Research each of the following skills separately.',
    ...topicLines,
    '',
    'Instructions:',
    '1. Collect dense technical material an expert interviewer would use: trade-offs, common misconceptions, design patterns.',
    '2. Synthesise it in your own words. Do not list sources, URLs or site names.',
    '3. Format the answer as one section per skill:',
    '   ## {SkillName}',
    '   [technical summary paragraphs]',
    '4. Write a section for EVERY skill. Use the exact header "## {SkillName}" with nothing else on that line.',
  ].join('\n');
}
