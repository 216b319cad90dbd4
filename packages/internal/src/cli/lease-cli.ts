import prompts, { type PromptObject } from "prompts";
import { forceReleaseLease, inspectLease } from "./lease-actions.js";

type PromptLike = (questions: PromptObject | PromptObject[]) => Promise<Record<string, unknown>>;

export const runLeaseCli = async (input?: { prompt?: PromptLike; projectId?: string }) => {
  const prompt = input?.prompt ?? prompts;
  const projectId = input?.projectId ?? process.env.FIREBASE_PROJECT_ID ?? "scriptorium";

  const answer = await prompt({
    type: "text",
    name: "assetId",
    message: "Asset id whose reservation should be released",
    validate: (value: string) => (value?.trim() ? true : "Enter an asset id")
  });
  const rawAssetId = answer?.assetId;
  const assetId = typeof rawAssetId === "string" ? rawAssetId.trim() : "";
  if (!assetId) {
    return { skipped: true } as const;
  }

  const lease = await inspectLease({ assetId, projectId });
  if (!lease) {
    return { assetId, found: false } as const;
  }

  const confirmation = await prompt({
    type: "confirm",
    name: "confirm",
    message: `Release the ${lease.state} lease held by ${lease.holder} (expires ${lease.expiresAt.toISOString()})?`,
    initial: false
  });
  if (confirmation?.confirm !== true) {
    return { skipped: true } as const;
  }

  const result = await forceReleaseLease({ assetId, projectId });
  return { ...result, holder: lease.holder, found: true } as const;
};
