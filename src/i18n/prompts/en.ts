import { PromptContext, PromptTemplates } from './types';

const truncationNote = (truncated: boolean) =>
  truncated ? '\nSome diffs were summarized or omitted to fit the prompt; do not guess their content.\n' : '';

export const enPrompts: PromptTemplates = {
  status: (context: PromptContext) => `You are a helpful coding assistant analyzing git changes.
Analyze the following uncommitted changes and provide a concise, human-readable summary.

**Changed Files:**
${context.fileList}

**Statistics:**
${context.stats}
${truncationNote(context.truncated)}
**Diff:**
\`\`\`diff
${context.content}
\`\`\`

**Instructions:**
1. Describe WHAT the developer is working on in 2-3 sentences
2. List the key changes as bullet points (max 5 bullets)
3. Note any potential issues or incomplete work if visible

Format your response as:
## Summary
[2-3 sentence overview]

## Key Changes
- [change 1]
- [change 2]

## Notes
[Any observations about incomplete work, potential issues, etc. Skip if none.]
`,

  commit: (context: PromptContext, subjectMaxLength: number) => `You are a helpful coding assistant. Generate a conventional commit message for these changes.

**Changed Files:**
${context.fileList}

**Statistics:**
${context.stats}
${truncationNote(context.truncated)}
**Diff:**
\`\`\`diff
${context.content}
\`\`\`

**Instructions:**
Generate a commit message following the Conventional Commits format:
- Type: feat, fix, docs, style, refactor, test, chore
- Scope: optional, in parentheses
- Subject: imperative mood, lowercase, no period, at most ${subjectMaxLength} characters
- Optionally, after one blank line, a short body explaining what and why

Examples:
- feat(auth): add JWT token refresh mechanism
- fix: resolve null pointer in user validation

Respond with ONLY the commit message, nothing else.
`,

  report: (context: PromptContext, days: number, totalCommits: number) => `You are a helpful coding assistant creating a progress report.

**Period:** Last ${days} days
**Total Commits:** ${totalCommits}

**Commit History and Changes:**
${context.content}
${truncationNote(context.truncated)}
**Instructions:**
Create a brief, developer-friendly progress report that:
1. Summarizes the main accomplishments in 2-3 sentences
2. Groups the work by the day it was committed
3. Describes each accomplishment as one bullet point

Format your response exactly as:

## Progress Summary
[2-3 sentence overview of accomplishments]

## YYYY-MM-DD
- [accomplishment]
- [accomplishment]

Use one "## YYYY-MM-DD" section per day that has commits, most recent day first, using the dates shown in the commit history.
`
};
