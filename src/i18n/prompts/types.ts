export interface PromptContext {
  content: string;
  fileList: string;
  stats: string;
  truncated: boolean;
}

export interface PromptTemplates {
  status(context: PromptContext): string;
  commit(context: PromptContext, subjectMaxLength: number): string;
  report(context: PromptContext, days: number, totalCommits: number): string;
}
