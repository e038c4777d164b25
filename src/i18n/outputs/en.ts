export const enOutputs = {
  appDescription: 'Turn git changes into summaries, commit messages and progress reports',
  headers: {
    status: 'Working Tree Summary',
    commit: 'Commit Message Generator',
    report: 'Progress Report Generator',
    wizard: 'Interactive Mode'
  },
  repository: (name: string) => `Repository: ${name}`,
  branch: (name: string, dirty: boolean) => `📍 ${name} ${dirty ? '🔴 Has uncommitted changes' : '🟢 Clean'}`,
  staged: (count: number) => `✓ Staged (${count}):`,
  modified: (count: number) => `● Modified (${count}):`,
  untracked: (count: number) => `? Untracked (${count}):`,
  andMore: (count: number) => `... and ${count} more`,
  lastActivity: (ago: string, at: string) => `🕐 Last activity: ${ago} (${at})`,
  ago: {
    minutes: (n: number) => `${n} minutes ago`,
    hours: (n: number) => `${n} hours ago`,
    yesterday: 'Yesterday',
    days: (n: number) => `${n} days ago`
  },
  nothingToSummarize: '✨ Working tree is clean. Nothing to summarize.',
  noCommits: (days: number) => `No commits found in the last ${days} days.`,
  foundCommits: (count: number, days: number) => `Found ${count} commits in the last ${days} days`,
  stagedFallback: 'No staged changes. Using all uncommitted changes.',
  diffStats: (files: number, additions: number, deletions: number) =>
    `📊 ${files} file${files === 1 ? '' : 's'} changed, +${additions} -${deletions}`,
  truncatedNotice: 'Large diff: some files were summarized to fit the prompt.',
  diffPreview: '📝 Diff Preview',
  moreLines: (count: number) => `... (${count} more lines)`,
  generating: (provider: string) => `🤖 Generating with ${provider}...`,
  summaryTitle: '🤖 AI Summary',
  commitTitle: '💡 Suggested Commit Message',
  copyHint: '📋 Copy the message above or run:',
  reportTitle: (days: number) => `📈 Progress Report (Last ${days} days)`,
  commitsTitle: '📜 Recent Commits',
  ungrouped: 'Highlights',
  pickHint: 'Numbers to include, e.g. 1,3-4 (Enter for all):',
  selectFiles: 'Select files to include:',
  selectCommits: 'Select commits to include in the report:',
  nothingSelected: 'Nothing selected. Exiting.',
  selectedCommits: (count: number) => `Selected ${count} commits for the report`,
  committed: (hash: string) => `✅ Commit created: ${hash}`,
  confirmCommit: 'Would you like to run this commit?',
  saved: (path: string) => `Report saved to: ${path}`,
  sentToSlack: '📤 Sent to Slack!',
  slack: {
    reportHeader: '📊 Git Progress Report',
    repository: 'Repository',
    period: 'Period',
    lastDays: (days: number) => `Last ${days} days`,
    totalCommits: 'Total Commits',
    average: 'Average',
    perDay: (average: number) => `${average} commits/day`,
    summary: '📝 Summary',
    recentCommits: '📜 Recent Commits',
    andMore: (count: number) => `... and ${count} more`,
    footer: 'Sent by gitbrief',
    reportText: (repo: string, days: number) => `Git progress report for ${repo} (last ${days} days)`,
    statusText: (repo: string) => `Work in progress on ${repo}`,
    statusHeader: (repo: string) => `🚧 Work in progress: ${repo}`
  },
  aborted: 'Aborted.',
  unexpectedError: (operation: string) => `${operation} failed`,
  initDone: (path: string) => `Created config at ${path}`,
  initExists: (path: string) => `Config already exists at ${path}`,
  wizard: {
    selectTask: 'What would you like to do?',
    tasks: {
      status: '📊 Summarize uncommitted changes',
      commit: '💡 Suggest a commit message',
      report: '📈 Generate a progress report',
      exit: '👋 Exit'
    },
    selectDays: 'Select time period for report:',
    dayChoices: [
      { days: 1, label: 'Today only' },
      { days: 3, label: 'Last 3 days' },
      { days: 7, label: 'Last week' },
      { days: 14, label: 'Last 2 weeks' },
      { days: 30, label: 'Last month' }
    ],
    customDays: 'Custom...',
    enterDays: 'Enter number of days (1-365):',
    invalidDays: 'Please enter a number between 1 and 365',
    showDiff: 'Show a diff preview?',
    applyCommit: 'Run git commit with the generated message?',
    savePath: 'Save report as Markdown (leave empty to skip):',
    sendSlack: 'Send to Slack?',
    confirm: (summary: string) => `Run ${summary}?`,
    invalidChoice: 'Please enter one of the listed numbers',
    goodbye: 'Goodbye! 👋'
  }
};

export type Outputs = typeof enOutputs;
