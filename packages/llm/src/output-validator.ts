export type OutputViolation = {
  code: "empty_output" | "invalid_json" | "output_wrapper_detected";
  message: string;
};

export type ValidateModelOutputArgs = {
  rawText: string;
  /** Accept JSON wrapped in a markdown fence or prose, reporting it as a notice. */
  allowWrappedJson?: boolean;
};

type ValidateModelOutputOk = {
  ok: true;
  sanitizedText: string;
  parsedJson: unknown;
  notices: OutputViolation[];
};

type ValidateModelOutputFailed = {
  ok: false;
  sanitizedText?: string;
  violations: OutputViolation[];
};

export type ValidateModelOutputResult = ValidateModelOutputOk | ValidateModelOutputFailed;

const WRAPPER_VIOLATION: OutputViolation = {
  code: "output_wrapper_detected",
  message: "Model output must be raw JSON without markdown or prose wrappers.",
};

function stripMarkdownFence(text: string): { text: string; wrapped: boolean } {
  const trimmed = text.trim();
  if (!trimmed.startsWith("```") || !trimmed.endsWith("```")) {
    return { text: trimmed, wrapped: false };
  }

  const inner = trimmed
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/i, "");
  return { text: inner.trim(), wrapped: true };
}

function extractWrappedJson(text: string): { jsonText: string; parsed: unknown } | null {
  const firstIndex = text.indexOf("{");
  if (firstIndex < 0) {
    return null;
  }

  const lastIndex = text.lastIndexOf("}");
  if (lastIndex <= firstIndex) {
    return null;
  }

  const candidate = text.slice(firstIndex, lastIndex + 1).trim();
  try {
    return { jsonText: candidate, parsed: JSON.parse(candidate) };
  } catch {
    return null;
  }
}

export function validateModelOutput(args: ValidateModelOutputArgs): ValidateModelOutputResult {
  const trimmed = args.rawText.trim();
  const allowWrappedJson = args.allowWrappedJson ?? true;

  if (!trimmed) {
    return {
      ok: false,
      violations: [{ code: "empty_output", message: "Model output is empty." }],
    };
  }

  const unwrapped = stripMarkdownFence(trimmed);
  if (unwrapped.wrapped && !allowWrappedJson) {
    return { ok: false, sanitizedText: unwrapped.text, violations: [WRAPPER_VIOLATION] };
  }
  const notices: OutputViolation[] = unwrapped.wrapped ? [WRAPPER_VIOLATION] : [];

  try {
    return {
      ok: true,
      sanitizedText: unwrapped.text,
      parsedJson: JSON.parse(unwrapped.text),
      notices,
    };
  } catch {
    const wrappedJson = extractWrappedJson(trimmed);
    if (!wrappedJson) {
      return {
        ok: false,
        sanitizedText: unwrapped.text,
        violations: [{ code: "invalid_json", message: "Model output is not valid JSON." }],
      };
    }

    if (!allowWrappedJson) {
      return { ok: false, sanitizedText: wrappedJson.jsonText, violations: [WRAPPER_VIOLATION] };
    }

    return {
      ok: true,
      sanitizedText: wrappedJson.jsonText,
      parsedJson: wrappedJson.parsed,
      notices: [WRAPPER_VIOLATION],
    };
  }
}
