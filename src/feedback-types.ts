export type ImageMimeType = "image/png" | "image/jpeg" | "image/bmp" | "image/gif";

export type ImagePayload = {
  bytesBase64Encoded: string;
  mimeType: ImageMimeType;
};

export type SessionDirective = "continue" | "terminate";

// "pause" is listed so the ui can render it, but it can never be selected.
export type SessionDirectiveChoice = SessionDirective | "pause";

export type FeedbackResult = {
  interactive_feedback: string;
  session_control: SessionDirective;
  images?: ImagePayload[];
};

export type PredefinedOption = {
  label: string;
  checked: boolean;
};

export type FeedbackRequest = {
  prompt: string;
  predefinedOptions: string[];
  contextInfo: string;
};

export type NoticeLevel = "info" | "success" | "error";

export type SessionNotice = {
  level: NoticeLevel;
  message: string;
};
