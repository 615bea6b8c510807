import React, { useCallback, useEffect, useState } from "react";
import { Box, Text, useApp, useInput } from "ink";
import Spinner from "ink-spinner";
import type { FeedbackSession } from "../core/feedback-session.js";
import { SESSION_DIRECTIVE_OPTIONS } from "../core/session-directive.js";
import { errorMessage } from "../errors.js";
import type { NoticeLevel, SessionNotice } from "../feedback-types.js";
import {
  clampIndex,
  describeImage,
  nextFocus,
  normalizeTypedInput,
  stripBoldMarkers,
  takeTrailingLineCommand,
  type FocusPane,
  type LineCommand,
} from "./helpers.js";

type FeedbackAppProps = {
  session: FeedbackSession;
};

const NOTICE_COLORS: Record<NoticeLevel, string> = {
  info: "cyan",
  success: "green",
  error: "red",
};

export function FeedbackApp({ session }: FeedbackAppProps): React.JSX.Element {
  const { exit } = useApp();
  const [, setVersion] = useState(0);
  const [notice, setNotice] = useState<SessionNotice | null>(null);
  const [focus, setFocus] = useState<FocusPane>(session.getOptions().length > 0 ? "options" : "text");
  const [optionCursor, setOptionCursor] = useState(0);
  const [directiveCursor, setDirectiveCursor] = useState(0);
  const [imageCursor, setImageCursor] = useState(0);

  useEffect(() => {
    return session.subscribe((event) => {
      if (event.type === "notice") {
        setNotice(event.notice);
      } else if (event.type === "ended") {
        exit();
        return;
      }
      setVersion((value) => value + 1);
    });
  }, [exit, session]);

  const runEnhancement = useCallback(() => {
    void session.enhance().catch((error) => {
      setNotice({ level: "error", message: errorMessage(error) });
    });
  }, [session]);

  const runLineCommand = useCallback(
    (command: LineCommand) => {
      if (command.kind === "clear-images") {
        session.clearImages();
        setNotice({ level: "info", message: "images cleared" });
        return;
      }
      if (!command.path) {
        setNotice({ level: "error", message: "usage: /image <path>" });
        return;
      }
      const added = session.addImageFromPath(command.path);
      if (added.ok) {
        setNotice({ level: "success", message: `attached ${command.path}` });
      }
    },
    [session],
  );

  const options = session.getOptions();
  const images = session.getImages();
  const enhancing = session.isEnhancing();

  useInput(
    (input, key) => {
      if (session.isEnded()) {
        return;
      }

      if (key.ctrl && input === "c") {
        session.close();
        return;
      }
      if (key.escape) {
        if (enhancing) {
          session.cancelEnhancement();
          setNotice({ level: "info", message: "enhancement cancelled" });
          return;
        }
        session.close();
        return;
      }
      if ((key.ctrl && (input === "s" || input === "j")) || input === "\n") {
        session.submit();
        return;
      }
      if (key.ctrl && input === "e") {
        runEnhancement();
        return;
      }
      if (key.ctrl && input === "r") {
        if (!session.resetEnhancement()) {
          setNotice({ level: "info", message: "nothing to restore" });
        }
        return;
      }
      if (key.tab) {
        setFocus((current) =>
          nextFocus(current, { options: options.length > 0, images: session.imagesEnabled }, key.shift ? -1 : 1),
        );
        return;
      }

      if (focus === "options") {
        if (key.upArrow || key.downArrow) {
          setOptionCursor((current) => clampIndex(current + (key.upArrow ? -1 : 1), options.length));
        } else if (input === " " || key.return) {
          session.toggleOption(optionCursor);
        }
        return;
      }

      if (focus === "directive") {
        if (key.upArrow || key.leftArrow || key.downArrow || key.rightArrow) {
          const step = key.upArrow || key.leftArrow ? -1 : 1;
          setDirectiveCursor((current) => clampIndex(current + step, SESSION_DIRECTIVE_OPTIONS.length));
        } else if (input === " " || key.return) {
          const choice = SESSION_DIRECTIVE_OPTIONS[directiveCursor];
          if (choice) {
            session.selectDirective(choice.value);
          }
        }
        return;
      }

      if (focus === "images") {
        if (key.upArrow || key.downArrow) {
          setImageCursor((current) => clampIndex(current + (key.upArrow ? -1 : 1), images.length));
        } else if ((key.delete || key.backspace) && images.length > 0) {
          session.removeImage(imageCursor);
          setImageCursor((current) => clampIndex(current, images.length - 1));
        }
        return;
      }

      if (enhancing) {
        return;
      }
      const text = session.getText();
      if (key.return) {
        const taken = takeTrailingLineCommand(text);
        if (taken) {
          session.setText(taken.rest);
          runLineCommand(taken.command);
          return;
        }
        session.setText(`${text}\n`);
        return;
      }
      if (key.backspace || key.delete) {
        session.setText(text.slice(0, -1));
        return;
      }
      if (!key.ctrl && !key.meta && input) {
        session.setText(text + normalizeTypedInput(input));
      }
    },
    { isActive: !session.isEnded() },
  );

  const text = session.getText();

  return (
    <Box flexDirection="column" paddingX={1}>
      <Box borderStyle="round" borderColor="gray" paddingX={1} flexDirection="column">
        <Text bold color="cyanBright">
          feedback requested
        </Text>
        <Text>{stripBoldMarkers(session.request.prompt)}</Text>
      </Box>

      {options.length > 0 ? (
        <Box flexDirection="column" marginTop={1}>
          <Text color={focus === "options" ? "cyanBright" : "gray"}>options</Text>
          {options.map((option, index) => (
            <Text key={`${index}-${option.label}`}>
              {focus === "options" && index === optionCursor ? "> " : "  "}
              {option.checked ? "[x] " : "[ ] "}
              {option.label}
            </Text>
          ))}
        </Box>
      ) : null}

      <Box
        flexDirection="column"
        marginTop={1}
        borderStyle="single"
        borderColor={focus === "text" ? "cyan" : "gray"}
        paddingX={1}
      >
        {text ? (
          <Text>
            {text}
            {focus === "text" && !enhancing ? <Text color="cyan">▌</Text> : null}
          </Text>
        ) : (
          <Text color="gray">{"type your feedback here (/image <path> attaches a file)"}</Text>
        )}
      </Box>

      <Box flexDirection="column" marginTop={1}>
        <Text color={focus === "directive" ? "cyanBright" : "gray"}>session: {session.describeDirective()}</Text>
        {SESSION_DIRECTIVE_OPTIONS.map((option, index) => (
          <Text key={option.value} color={option.enabled ? undefined : "gray"}>
            {focus === "directive" && index === directiveCursor ? "> " : "  "}
            {session.getDirective() === option.value ? "(•) " : "( ) "}
            {option.label}
            {option.enabled ? "" : ` (${option.description})`}
          </Text>
        ))}
      </Box>

      {session.imagesEnabled ? (
        <Box flexDirection="column" marginTop={1}>
          <Text color={focus === "images" ? "cyanBright" : "gray"}>images ({images.length})</Text>
          {images.map((entry, index) => (
            <Text key={`${index}-${entry.source}`}>
              {focus === "images" && index === imageCursor ? "> " : "  "}
              {describeImage(entry, index)}
            </Text>
          ))}
        </Box>
      ) : null}

      <Box marginTop={1}>
        {enhancing ? (
          <Text color="yellow">
            <Spinner type="dots" /> enhancing prompt (esc cancels)
          </Text>
        ) : notice ? (
          <Text color={NOTICE_COLORS[notice.level]}>{notice.message}</Text>
        ) : (
          <Text color="gray">
            {session.isEnhancementAvailable() ? "ctrl+e enhances the text" : "prompt enhancement unavailable"}
          </Text>
        )}
      </Box>
      <Text color="gray">
        tab focus · space toggle · ctrl+e enhance · ctrl+r restore · ctrl+s/ctrl+j submit · esc close
      </Text>
    </Box>
  );
}
