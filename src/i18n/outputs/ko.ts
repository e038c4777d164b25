import { Outputs } from './en';

export const koOutputs: Outputs = {
  appDescription: 'git 변경사항을 요약, 커밋 메시지, 진행 보고서로 바꿔주는 도구',
  headers: {
    status: '작업 트리 요약',
    commit: '커밋 메시지 생성',
    report: '진행 보고서 생성',
    wizard: '대화형 모드'
  },
  repository: (name: string) => `레포지토리: ${name}`,
  branch: (name: string, dirty: boolean) => `📍 ${name} ${dirty ? '🔴 커밋되지 않은 변경사항 있음' : '🟢 깨끗함'}`,
  staged: (count: number) => `✓ 스테이징됨 (${count}):`,
  modified: (count: number) => `● 수정됨 (${count}):`,
  untracked: (count: number) => `? 추적되지 않음 (${count}):`,
  andMore: (count: number) => `... 외 ${count}개`,
  lastActivity: (ago: string, at: string) => `🕐 마지막 활동: ${ago} (${at})`,
  ago: {
    minutes: (n: number) => `${n}분 전`,
    hours: (n: number) => `${n}시간 전`,
    yesterday: '어제',
    days: (n: number) => `${n}일 전`
  },
  nothingToSummarize: '✨ 작업 트리가 깨끗합니다. 요약할 내용이 없습니다.',
  noCommits: (days: number) => `최근 ${days}일 동안 커밋이 없습니다.`,
  foundCommits: (count: number, days: number) => `최근 ${days}일 동안 커밋 ${count}개 발견`,
  stagedFallback: '스테이징된 변경사항이 없어 모든 변경사항을 사용합니다.',
  diffStats: (files: number, additions: number, deletions: number) =>
    `📊 파일 ${files}개 변경, +${additions} -${deletions}`,
  truncatedNotice: 'diff가 커서 일부 파일은 요약되었습니다.',
  diffPreview: '📝 Diff 미리보기',
  moreLines: (count: number) => `... (${count}줄 더 있음)`,
  generating: (provider: string) => `🤖 ${provider}로 생성 중...`,
  summaryTitle: '🤖 AI 요약',
  commitTitle: '💡 추천 커밋 메시지',
  copyHint: '📋 위 메시지를 복사하거나 실행하세요:',
  reportTitle: (days: number) => `📈 진행 보고서 (최근 ${days}일)`,
  commitsTitle: '📜 최근 커밋',
  ungrouped: '주요 내용',
  pickHint: '포함할 번호를 입력하세요. 예: 1,3-4 (Enter는 전체):',
  selectFiles: '포함할 파일을 선택하세요:',
  selectCommits: '보고서에 포함할 커밋을 선택하세요:',
  nothingSelected: '선택된 항목이 없어 종료합니다.',
  selectedCommits: (count: number) => `보고서에 커밋 ${count}개 선택됨`,
  committed: (hash: string) => `✅ 커밋 생성됨: ${hash}`,
  confirmCommit: '이 메시지로 커밋할까요?',
  saved: (path: string) => `보고서 저장됨: ${path}`,
  sentToSlack: '📤 Slack으로 전송됨!',
  slack: {
    reportHeader: '📊 Git 진행 보고서',
    repository: '레포지토리',
    period: '기간',
    lastDays: (days: number) => `최근 ${days}일`,
    totalCommits: '전체 커밋',
    average: '평균',
    perDay: (average: number) => `하루 ${average}개 커밋`,
    summary: '📝 요약',
    recentCommits: '📜 최근 커밋',
    andMore: (count: number) => `... 외 ${count}개`,
    footer: 'gitbrief에서 전송',
    reportText: (repo: string, days: number) => `${repo} 진행 보고서 (최근 ${days}일)`,
    statusText: (repo: string) => `${repo} 작업 진행 상황`,
    statusHeader: (repo: string) => `🚧 작업 진행 중: ${repo}`
  },
  aborted: '중단되었습니다.',
  unexpectedError: (operation: string) => `${operation} 실패`,
  initDone: (path: string) => `설정 파일 생성됨: ${path}`,
  initExists: (path: string) => `설정 파일이 이미 있습니다: ${path}`,
  wizard: {
    selectTask: '무엇을 할까요?',
    tasks: {
      status: '📊 커밋되지 않은 변경사항 요약',
      commit: '💡 커밋 메시지 추천',
      report: '📈 진행 보고서 생성',
      exit: '👋 종료'
    },
    selectDays: '보고서 기간을 선택하세요:',
    dayChoices: [
      { days: 1, label: '오늘' },
      { days: 3, label: '최근 3일' },
      { days: 7, label: '최근 1주' },
      { days: 14, label: '최근 2주' },
      { days: 30, label: '최근 1달' }
    ],
    customDays: '직접 입력...',
    enterDays: '일 수를 입력하세요 (1-365):',
    invalidDays: '1에서 365 사이의 숫자를 입력하세요',
    showDiff: 'diff 미리보기를 표시할까요?',
    applyCommit: '생성된 메시지로 git commit을 실행할까요?',
    savePath: 'Markdown으로 저장할 경로 (건너뛰려면 비워두세요):',
    sendSlack: 'Slack으로 보낼까요?',
    confirm: (summary: string) => `${summary} 실행할까요?`,
    invalidChoice: '목록에 있는 번호를 입력하세요',
    goodbye: '안녕히 가세요! 👋'
  }
};
