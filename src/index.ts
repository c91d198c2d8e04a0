#!/usr/bin/env node
import "dotenv/config";
import blessed from "blessed";
import { RAG_CONFIG } from "./rag/config.js";
import { HttpEmbeddingGateway } from "./rag/embedding-service.js";
import { ConsistencyError, errorMessage } from "./rag/errors.js";
import { SUPPORTED_EXTENSIONS } from "./rag/extraction/index.js";
import { HttpLlmGateway, type ChatMessage } from "./rag/llm-gateway.js";
import { initRagPipeline, SYSTEM_PROMPT, type RagPipeline } from "./rag/pipeline.js";

// ── State ───────────────────────────────────────────────────────────────────
const apiKey = process.env["OPENROUTER_API_KEY"];
if (!apiKey) {
  console.error("Error: OPENROUTER_API_KEY environment variable is required.");
  console.error("  export OPENROUTER_API_KEY=your-key");
  process.exit(1);
}

const gatewayOptions = {
  apiKey,
  baseUrl: RAG_CONFIG.apiBaseUrl,
  timeoutMs: RAG_CONFIG.requestTimeoutMs,
};
const embeddings = new HttpEmbeddingGateway({
  ...gatewayOptions,
  model: RAG_CONFIG.embeddingModel,
  batchSize: RAG_CONFIG.embeddingBatchSize,
  concurrency: RAG_CONFIG.embeddingConcurrency,
});
const llm = new HttpLlmGateway({ ...gatewayOptions, model: RAG_CONFIG.chatModel });

const history: ChatMessage[] = [];
let streaming = false;
let abortController: AbortController | null = null;
let ragPipeline: RagPipeline | null = null;

// ── UI Setup ────────────────────────────────────────────────────────────────
const screen = blessed.screen({
  smartCSR: true,
  title: "tablesense",
});

const chatBox = blessed.log({
  parent: screen,
  top: 0,
  left: 0,
  width: "100%",
  height: "100%-3",
  scrollable: true,
  alwaysScroll: true,
  scrollbar: {
    ch: "│",
    style: { bg: "blue" },
  },
  border: { type: "line" },
  style: {
    border: { fg: "blue" },
  },
  label: ` tablesense · ${RAG_CONFIG.chatModel} `,
  tags: true,
  mouse: true,
});

const inputBox = blessed.textbox({
  parent: screen,
  bottom: 0,
  left: 0,
  width: "100%",
  height: 3,
  border: { type: "line" },
  style: {
    border: { fg: "green" },
    focus: { border: { fg: "yellow" } },
  },
  label: " you > ",
  inputOnFocus: false,
  mouse: true,
});

function shutdown(): void {
  const closing = ragPipeline ? ragPipeline.close() : Promise.resolve();
  closing
    .catch((err: unknown) => {
      console.error(`Failed to flush collection: ${errorMessage(err)}`);
    })
    .finally(() => process.exit(0));
}

screen.key(["C-c"], shutdown);
inputBox.key(["C-c"], shutdown);

// Esc stops a reply mid-stream; otherwise it just clears the input
screen.key(["escape"], () => {
  if (streaming) abortController?.abort();
});

// Re-focus input whenever it loses focus (e.g. mouse click on chatBox)
// Use setTimeout to break the blur→focus→render→blur cycle
inputBox.on("blur", () => {
  if (!streaming) setTimeout(() => promptInput(), 0);
});

chatBox.log("Ask about your documents below. /help for commands, Esc to stop a reply, Ctrl+C to quit.");
chatBox.log("");
screen.render();

// ── Input Helpers ───────────────────────────────────────────────────────────
function promptInput(): void {
  inputBox.readInput(() => {/* handled by submit event */});
}

function info(msg: string): void {
  chatBox.log(`{grey-fg}  ${msg}{/}`);
  screen.render();
}

// ── Spinner ─────────────────────────────────────────────────────────────────
const spinFrames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
let spinIdx = 0;
let spinTimer: ReturnType<typeof setInterval> | null = null;
let spinElapsed = 0;
let spinLabel = "thinking";

function startSpinner(label: string): void {
  stopSpinner();
  spinLabel = label;
  spinIdx = 0;
  spinElapsed = 0;
  updateSpinnerLine();
  spinTimer = setInterval(() => {
    spinIdx = (spinIdx + 1) % spinFrames.length;
    spinElapsed += 100;
    updateSpinnerLine();
  }, 100);
}

function removeSpinnerLine(): void {
  const lines = chatBox.getLines();
  if (lines.at(-1)?.includes(`${spinLabel}...`)) {
    chatBox.deleteLine(lines.length - 1);
  }
}

function updateSpinnerLine(): void {
  removeSpinnerLine();
  const secs = (spinElapsed / 1000).toFixed(1);
  chatBox.log(`{grey-fg}  ${spinFrames[spinIdx] ?? ""} ${spinLabel}... ${secs}s{/}`);
  screen.render();
}

function stopSpinner(): void {
  if (spinTimer) {
    clearInterval(spinTimer);
    spinTimer = null;
  }
  removeSpinnerLine();
}

// ── Commands ────────────────────────────────────────────────────────────────
const HELP = [
  "/stats              collection size and breakdown",
  "/ingest <path>      add or refresh one file",
  "/remove <path|id>   drop a file's chunks",
  "/rerank on|off      toggle LLM reranking",
  "/rebuild            re-index every tracked file from scratch",
  `file types: ${SUPPORTED_EXTENSIONS.join(" ")}`,
];

async function runCommand(input: string): Promise<void> {
  const [command = "", ...rest] = input.split(/\s+/);
  const arg = rest.join(" ").trim();

  if (command === "/help") {
    HELP.forEach(info);
    return;
  }
  if (!ragPipeline) {
    info("RAG is still starting up, try again in a moment");
    return;
  }

  switch (command) {
    case "/stats": {
      const s = ragPipeline.stats();
      info(
        `${s.files} file(s), ${s.documents} document(s), ${s.chunks} chunks ` +
          `(${s.byKind.analysis} analysis, ${s.byKind.data} data, ${s.byKind.plain_text} text), ` +
          `dimension ${s.dimension ?? "-"}, rerank ${ragPipeline.rerankEnabled ? "on" : "off"}` +
          (s.halted ? ", HALTED (run /rebuild)" : ""),
      );
      return;
    }
    case "/rebuild": {
      startSpinner("rebuilding");
      const s = await ragPipeline.rebuild();
      stopSpinner();
      info(`\u{2713} rebuilt: ${s.documents} document(s), ${s.chunks} chunks`);
      return;
    }
    case "/ingest": {
      if (!arg) return info("usage: /ingest <path>");
      startSpinner("ingesting");
      const result = await ragPipeline.ingestFile(arg);
      stopSpinner();
      info(result ? `\u{2713} ${result.totalChunks} chunks from ${arg}` : `${arg} had nothing to index`);
      return;
    }
    case "/remove": {
      if (!arg) return info("usage: /remove <path|id>");
      const removed = await ragPipeline.removeDocument(arg);
      info(`removed ${removed} chunk(s)`);
      return;
    }
    case "/rerank": {
      if (arg !== "on" && arg !== "off") return info("usage: /rerank on|off");
      ragPipeline.setRerank(arg === "on");
      info(`rerank ${arg}`);
      return;
    }
    default:
      info(`unknown command ${command}, try /help`);
  }
}

// ── Chat Logic ──────────────────────────────────────────────────────────────
async function streamChat(userMessage: string, signal: AbortSignal): Promise<void> {
  let tokens: AsyncIterable<string>;
  const options = { history: [...history], signal };

  if (ragPipeline) {
    startSpinner("gathering context");
    const answer = await ragPipeline.answer(userMessage, options);
    stopSpinner();
    if (answer.sourcesLine) {
      info(`\u{2713} \u{1F4C4} ${answer.sourcesLine}`);
    }
    tokens = answer.tokens;
  } else {
    tokens = llm.stream(userMessage, { ...options, system: SYSTEM_PROMPT });
  }

  startSpinner("thinking");
  const t0 = performance.now();
  let replyStart = -1;
  let fullReply = "";

  for await (const token of tokens) {
    if (replyStart < 0) {
      stopSpinner();
      replyStart = chatBox.getLines().length;
    }
    fullReply += token;
    updateStreamingReply(fullReply, replyStart);
  }
  stopSpinner();

  if (!fullReply) {
    info("(no reply)");
    return;
  }
  info(`\u{2713} answered in ${((performance.now() - t0) / 1000).toFixed(1)}s`);
  history.push({ role: "user", content: userMessage }, { role: "assistant", content: fullReply });
}

function updateStreamingReply(text: string, replyStart: number): void {
  const lines = chatBox.getLines();
  for (let i = lines.length - 1; i >= replyStart; i--) {
    chatBox.deleteLine(i);
  }
  for (const line of text.split("\n")) {
    chatBox.log("  " + line);
  }
  screen.render();
}

// ── Input Handler ───────────────────────────────────────────────────────────
inputBox.on("submit", (value: string) => {
  const text = value.trim();
  inputBox.clearValue();
  screen.render();

  if (!text || streaming) {
    promptInput();
    return;
  }

  chatBox.log(`{green-fg}you >{/} ${text}`);
  streaming = true;
  inputBox.style.border.fg = "grey";
  inputBox.setLabel(" ... ");
  screen.render();

  const controller = new AbortController();
  abortController = controller;
  const work = text.startsWith("/") ? runCommand(text) : streamChat(text, controller.signal);

  work
    .catch((err: unknown) => {
      stopSpinner();
      if (controller.signal.aborted) {
        info("(stopped)");
      } else {
        chatBox.log(`{red-fg}error:{/} ${errorMessage(err)}`);
        if (err instanceof ConsistencyError) info("the collection is halted; /rebuild re-indexes it from your files");
      }
    })
    .finally(() => {
      streaming = false;
      abortController = null;
      chatBox.log("");
      inputBox.style.border.fg = "green";
      inputBox.setLabel(" you > ");
      screen.render();
      promptInput();
    });
});

inputBox.key(["escape"], () => {
  inputBox.cancel();
});

// ── RAG Initialization (non-blocking) ──────────────────────────────────────
initRagPipeline({ embeddings, llm }, (msg) => {
  chatBox.log(`{grey-fg}${msg}{/}`);
  screen.render();
})
  .then((pipeline) => {
    ragPipeline = pipeline;
    chatBox.log("");
    screen.render();
  })
  .catch((err: unknown) => {
    chatBox.log(`{yellow-fg}RAG init failed (chat still works): ${errorMessage(err)}{/}`);
    screen.render();
  });

screen.render();
promptInput();
