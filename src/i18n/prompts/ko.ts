import { PromptContext, PromptTemplates } from './types';

const truncationNote = (truncated: boolean) =>
  truncated ? '\n일부 diff는 프롬프트 크기 제한으로 요약되거나 생략되었습니다. 생략된 내용을 추측하지 마세요.\n' : '';

export const koPrompts: PromptTemplates = {
  status: (context: PromptContext) => `당신은 git 변경사항을 분석하는 코딩 어시스턴트입니다.
아래의 커밋되지 않은 변경사항을 분석하고 간결하고 읽기 쉬운 요약을 작성하세요.

**변경된 파일:**
${context.fileList}

**통계:**
${context.stats}
${truncationNote(context.truncated)}
**Diff:**
\`\`\`diff
${context.content}
\`\`\`

**지침:**
1. 개발자가 무엇을 작업 중인지 2-3 문장으로 설명
2. 주요 변경사항을 글머리 기호로 나열 (최대 5개)
3. 미완성 작업이나 잠재적 문제가 보이면 언급

다음 형식으로 응답하세요:
## 요약
[2-3 문장 개요]

## 주요 변경사항
- [변경 1]
- [변경 2]

## 참고
[미완성 작업, 잠재적 문제 등. 없으면 생략]
`,

  commit: (context: PromptContext, subjectMaxLength: number) => `당신은 코딩 어시스턴트입니다. 아래 변경사항에 대한 conventional commit 메시지를 작성하세요.

**변경된 파일:**
${context.fileList}

**통계:**
${context.stats}
${truncationNote(context.truncated)}
**Diff:**
\`\`\`diff
${context.content}
\`\`\`

**지침:**
Conventional Commits 형식을 따르세요:
- Type: feat, fix, docs, style, refactor, test, chore
- Scope: 선택 사항, 괄호 안에 작성
- Subject: 명령형, 마침표 없이, 최대 ${subjectMaxLength}자
- 필요하면 빈 줄 하나 뒤에 무엇을 왜 바꿨는지 짧은 본문 추가

예시:
- feat(auth): add JWT token refresh mechanism
- fix: resolve null pointer in user validation

커밋 메시지만 응답하세요.
`,

  report: (context: PromptContext, days: number, totalCommits: number) => `당신은 진행 보고서를 작성하는 코딩 어시스턴트입니다.

**기간:** 최근 ${days}일
**총 커밋 수:** ${totalCommits}

**커밋 기록 및 변경사항:**
${context.content}
${truncationNote(context.truncated)}
**지침:**
개발자 친화적인 간결한 진행 보고서를 작성하세요:
1. 주요 성과를 2-3 문장으로 요약
2. 커밋된 날짜별로 작업을 묶기
3. 각 성과를 글머리 기호 하나로 설명

정확히 다음 형식으로 응답하세요:

## Progress Summary
[성과 개요 2-3 문장]

## YYYY-MM-DD
- [성과]
- [성과]

커밋이 있는 날마다 "## YYYY-MM-DD" 섹션을 하나씩, 최근 날짜부터, 커밋 기록에 표시된 날짜를 사용해 작성하세요.
`
};
