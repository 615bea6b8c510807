import type { FeedbackConfig } from "../config.js";
import type { FeedbackRequest, FeedbackResult, SessionDirective } from "../feedback-types.js";
import { launchFeedbackUi } from "../exchange/launcher.js";
import { createScopedLogger } from "../logging.js";
import type { ImageContent } from "../rpc/protocol.js";

const log = createScopedLogger("tool");

export type FeedbackToolResponse = {
  text: string;
  directive: SessionDirective;
  images: ImageContent[];
};

export type FeedbackLauncher = (request: FeedbackRequest) => Promise<FeedbackResult>;

export function formatFeedbackText(result: FeedbackResult): string {
  return `${result.interactive_feedback}\n\n[会话控制: ${result.session_control}]`;
}

export class FeedbackToolService {
  constructor(private readonly launch: FeedbackLauncher) {}

  /** Asks the user through the ui and waits until they submit or close it. */
  async requestFeedback(
    message: string,
    predefinedOptions: readonly string[] = [],
    contextInfo = "",
  ): Promise<FeedbackToolResponse> {
    const request: FeedbackRequest = {
      prompt: message,
      predefinedOptions: predefinedOptions.map((option) => option.trim()).filter(Boolean),
      contextInfo,
    };
    log(
      `requesting feedback (${message.length} chars, ${request.predefinedOptions.length} options, ` +
        `${contextInfo.length} chars of context)`,
    );

    const result = await this.launch(request);
    const images = (result.images ?? []).map(
      (image): ImageContent => ({ type: "image", data: image.bytesBase64Encoded, mimeType: image.mimeType }),
    );
    log(`feedback received (directive=${result.session_control}, images=${images.length})`);

    return {
      text: formatFeedbackText(result),
      directive: result.session_control,
      images,
    };
  }
}

export function createFeedbackToolService(
  config: Pick<FeedbackConfig, "imagesEnabled" | "terminalCommand">,
): FeedbackToolService {
  return new FeedbackToolService((request) =>
    launchFeedbackUi(request, {
      imagesEnabled: config.imagesEnabled,
      terminalCommand: config.terminalCommand,
    }),
  );
}
