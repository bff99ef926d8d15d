/**
 * Prompt templates and configuration
 */

export interface PromptConfig {
  outline: string;
  chapter: string;
}

/**
 * Default prompts - can be overridden via environment
 */
export const DEFAULT_PROMPTS: PromptConfig = {
  outline: `Create a detailed book outline for a {genre} book with the following specifications:

Title: {title}
Target Audience: {target_audience}
Main Theme: {theme}
Estimated Length: {length} words

Additional Details:
{additional_details}

Please provide:
1. A compelling book summary
2. Detailed chapter outline (aim for {num_chapters} chapters)
3. Character descriptions (if applicable)
4. Key plot points or main concepts
5. Tone and style recommendations

Format the response clearly with headers for each section.`,

  chapter: `Write Chapter {chapter_number}: "{chapter_title}" for the book "{title}".

Book Context:
- Genre: {genre}
- Target Audience: {target_audience}
- Theme: {theme}

Chapter Guidelines:
- Chapter Description: {chapter_description}
- Target Length: Approximately {chapter_length} words
- Tone: {tone}

Book Outline Context:
{outline}...

Write a complete, engaging chapter that fits well within the overall book structure.
Include proper pacing, character development (if applicable), and advance the main theme or plot.`,
};

export function getPrompts(): PromptConfig {
  return {
    outline: process.env.PROMPT_OUTLINE || DEFAULT_PROMPTS.outline,
    chapter: process.env.PROMPT_CHAPTER || DEFAULT_PROMPTS.chapter,
  };
}

/**
 * Build a prompt from template. Substitution is a single pass, so values
 * that happen to contain `{name}` are left as written.
 */
export function buildPrompt(template: string, variables: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : placeholder
  );
}
