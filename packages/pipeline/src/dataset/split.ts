import { readFile } from "node:fs/promises";
import { TurnRole } from "@clarify-corpus/shared";
import type { AlpacaSample } from "@clarify-corpus/shared";
import { ConfigurationError, toErrorMessage } from "../errors.js";
import { asArray, asRecord, asString, writeJsonAtomic } from "../utils.js";

export interface SplitDatasetOptions {
  inputFile: string;
  outputFile: string;
  /** Only the first N conversations; 0 or absent takes all. */
  maxConversations?: number;
}

export interface SplitDatasetResult {
  conversations: number;
  samples: number;
  /** Keyed by the number of samples a conversation produced. */
  conversationsBySampleCount: Record<string, number>;
}

/**
 * One training sample per responder turn. Each sample carries the earlier
 * requester/responder pairs as history.
 */
export function splitConversation(record: unknown): AlpacaSample[] {
  const source = asRecord(record);
  const system = asString(source?.system) ?? "";
  const samples: AlpacaSample[] = [];
  const history: Array<[string, string]> = [];
  let pendingRequest: string | null = null;

  for (const rawTurn of asArray(source?.conversations)) {
    const turn = asRecord(rawTurn);
    const value = asString(turn?.value) ?? "";
    if (turn?.from === TurnRole.Requester) {
      pendingRequest = value;
      continue;
    }
    if (turn?.from !== TurnRole.Responder) {
      continue;
    }

    const sample: AlpacaSample = {
      instruction: pendingRequest ?? "",
      input: "",
      output: value,
      ...(system ? { system } : {}),
      history: history.map(([request, reply]): [string, string] => [request, reply]),
    };
    samples.push(sample);

    if (pendingRequest) {
      history.push([pendingRequest, value]);
      pendingRequest = null;
    }
  }

  return samples;
}

export async function splitDataset(options: SplitDatasetOptions): Promise<SplitDatasetResult> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(options.inputFile, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${options.inputFile}: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }
  if (!Array.isArray(data)) {
    throw new ConfigurationError(`${options.inputFile} does not hold a JSON array`);
  }

  const limit = options.maxConversations && options.maxConversations > 0 ? options.maxConversations : data.length;
  const conversations = data.slice(0, limit);
  const samples: AlpacaSample[] = [];
  const conversationsBySampleCount: Record<string, number> = {};

  for (const conversation of conversations) {
    const produced = splitConversation(conversation);
    samples.push(...produced);
    const key = String(produced.length);
    conversationsBySampleCount[key] = (conversationsBySampleCount[key] ?? 0) + 1;
  }

  await writeJsonAtomic(options.outputFile, samples);
  return { conversations: conversations.length, samples: samples.length, conversationsBySampleCount };
}
