export { synthesizeBriefing } from "./synthesizer";

export {
  buildSubject,
  renderBriefingHtml,
  renderBriefingMarkdown,
  renderBriefingText,
} from "./renderer";

export { createGmailSender } from "./sender";
export type { SendResult, SendDigestFn, OutgoingBriefing } from "./sender";

export type { Briefing, BriefingSection, QuickHit, BriefingSource } from "./types";
