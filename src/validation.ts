import { z } from 'zod';
import { PLATFORMS } from './models.js';
import type { PostInput, PostPatch } from './models.js';
import { parseScheduledDatetime } from './dates.js';

export const MISSING_FIELDS = 'Missing required fields';
export const INVALID_DATETIME = 'Invalid datetime format. Use ISO format: YYYY-MM-DDTHH:mm';
export const INVALID_PLATFORM = `Invalid platform. Use one of: ${PLATFORMS.join(', ')}`;

const platformField = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(PLATFORMS, { errorMap: () => ({ message: INVALID_PLATFORM }) }));

const captionField = z.string().trim().min(1, 'Caption cannot be empty');

const scheduledField = z.string().transform((value, ctx) => {
  const ms = parseScheduledDatetime(value);
  if (ms === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: INVALID_DATETIME });
    return z.NEVER;
  }
  return ms;
});

const noteField = z
  .string()
  .nullish()
  .transform((value) => (value ?? '').trim());

export const createPostSchema = z
  .object({
    platform: platformField,
    caption: captionField,
    scheduled_datetime: scheduledField,
    link_or_asset_note: noteField
  })
  .transform(
    (body): PostInput => ({
      platform: body.platform,
      caption: body.caption,
      scheduledAt: body.scheduled_datetime,
      linkOrAssetNote: body.link_or_asset_note
    })
  );

export const updatePostSchema = z
  .object({
    platform: platformField.optional(),
    caption: captionField.optional(),
    scheduled_datetime: scheduledField.optional(),
    link_or_asset_note: noteField.optional()
  })
  .transform((body) => {
    const patch: PostPatch = {};
    if (body.platform !== undefined) patch.platform = body.platform;
    if (body.caption !== undefined) patch.caption = body.caption;
    if (body.scheduled_datetime !== undefined) patch.scheduledAt = body.scheduled_datetime;
    if (body.link_or_asset_note !== undefined) patch.linkOrAssetNote = body.link_or_asset_note;
    return patch;
  });

/**
 * First user-facing message for a failed parse. Absent required fields take
 * precedence over every other issue.
 */
export function validationMessage(error: z.ZodError): string {
  const issues = error.issues;
  const root = issues.find((issue) => issue.path.length === 0);
  if (root) return 'Request body must be a JSON object';
  if (issues.some((issue) => issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined')) {
    return MISSING_FIELDS;
  }
  return issues[0]?.message ?? 'Invalid request';
}

export type ParseResult<T> = { success: true; data: T } | { success: false; error: string };

export function parsePostInput(body: unknown): ParseResult<PostInput> {
  const parsed = createPostSchema.safeParse(body);
  return parsed.success ? { success: true, data: parsed.data } : { success: false, error: validationMessage(parsed.error) };
}

export function parsePostPatch(body: unknown): ParseResult<PostPatch> {
  const parsed = updatePostSchema.safeParse(body);
  return parsed.success ? { success: true, data: parsed.data } : { success: false, error: validationMessage(parsed.error) };
}

const formField = z.string().catch('');

// Raw values echoed back into the scheduler form after a failed submit.
export const postFormSchema = z
  .object({
    platform: formField,
    caption: formField,
    scheduled_datetime: formField,
    link_or_asset_note: formField
  })
  .catch({ platform: '', caption: '', scheduled_datetime: '', link_or_asset_note: '' });

export type PostFormValues = z.infer<typeof postFormSchema>;

export function readPostForm(body: unknown): PostFormValues {
  return postFormSchema.parse(body);
}
