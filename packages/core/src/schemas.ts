import { z } from "zod";

// Definition-document keys show up as numbers or numeric strings, mixed in
// the same array. Both land in the same integer key space.
export const choiceKeySchema = z.union([
  z.number().int(),
  z.string().regex(/^\s*-?\d+\s*$/).transform((value) => Number.parseInt(value, 10)),
]);

export const displayChoiceSchema = z.object({
  Display: z.string().optional().default(""),
  TextEntry: z.union([z.string(), z.boolean()]).optional(),
});

const keyedChoicesSchema = z.record(z.string(), displayChoiceSchema);
const emptyChoicesSchema = z.array(z.unknown()).max(0);

export const surveyEntrySchema = z.object({
  SurveyID: z.string().optional(),
  SurveyName: z.string().optional().default(""),
  SurveyDescription: z.string().nullish().transform((value) => value ?? ""),
  SurveyStatus: z.string().optional().default(""),
  SurveyStartDate: z.string().nullish(),
  SurveyCreationDate: z.string().nullish(),
  LastModified: z.string().nullish(),
});

export const documentSchema = z.object({
  SurveyElements: z.array(z.unknown()),
});

// Cheap look at the discriminator before committing to a shape.
export const elementProbeSchema = z.object({
  Element: z.string(),
});

export const blockSchema = z.object({
  Type: z.string().optional().default("Standard"),
  ID: z.string(),
  Description: z.string().optional(),
  BlockElements: z
    .array(
      z.object({
        Type: z.string(),
        QuestionID: z.string().optional(),
      })
    )
    .optional()
    .default([]),
});

export const blocksElementSchema = z.object({
  Element: z.literal("BL"),
  Payload: z.union([z.array(blockSchema), z.record(z.string(), blockSchema)]),
});

export const embeddedFieldSchema = z.object({
  Field: z.string().min(1),
  Type: z.string().optional(),
  VariableType: z.string().optional(),
  Description: z.string().optional(),
});

export type FlowNode = {
  ID?: string;
  Type?: string;
  FlowID?: string;
  Flow?: FlowNode[];
  EmbeddedData?: z.infer<typeof embeddedFieldSchema>[];
};

export const flowNodeSchema: z.ZodType<FlowNode> = z.lazy(() =>
  z.object({
    ID: z.string().optional(),
    Type: z.string().optional(),
    FlowID: z.string().optional(),
    Flow: z.array(flowNodeSchema).optional(),
    EmbeddedData: z.array(embeddedFieldSchema).optional(),
  })
);

export const flowElementSchema = z.object({
  Element: z.literal("FL"),
  Payload: z.object({
    Flow: z.array(flowNodeSchema).optional().default([]),
  }),
});

export const countElementSchema = z.object({
  Element: z.literal("QC"),
  SecondaryAttribute: z.union([z.string(), z.number()]).nullish(),
});

const questionCommon = {
  QuestionID: z.string().min(1),
  DataExportTag: z.string().optional(),
  QuestionType: z.string(),
  Selector: z.string().optional().default(""),
  SubSelector: z.string().nullish().transform((value) => value ?? ""),
  QuestionText: z.string().optional().default(""),
  QuestionDescription: z.string().optional(),
};

export const dynamicChoicesSchema = z.object({
  DynamicType: z.string().optional(),
  Locator: z.string(),
  Type: z.string().optional(),
});

export const keyedQuestionPayloadSchema = z.object({
  ...questionCommon,
  Choices: z.union([keyedChoicesSchema, emptyChoicesSchema]).optional(),
  ChoiceOrder: z.array(choiceKeySchema).optional().default([]),
  Answers: z.union([keyedChoicesSchema, emptyChoicesSchema]).optional(),
  AnswerOrder: z.array(choiceKeySchema).optional().default([]),
  VariableNaming: z.record(z.string(), z.string()).optional(),
  ChoiceDataExportTags: z.union([z.boolean(), z.record(z.string(), z.string())]).optional(),
  DynamicChoices: dynamicChoicesSchema.optional(),
  Groups: z.array(z.string()).optional().default([]),
});

// Fixed-scale (NPS) questions list their choices positionally. The values are
// always 0..10, so only the descriptive fields are kept.
export const fixedScaleQuestionPayloadSchema = z.object({
  ...questionCommon,
  Choices: z.array(z.record(z.string(), z.unknown())).min(1),
});

export const keyedQuestionElementSchema = z.object({
  Element: z.literal("SQ"),
  Payload: keyedQuestionPayloadSchema,
});

export const fixedScaleQuestionElementSchema = z.object({
  Element: z.literal("SQ"),
  Payload: fixedScaleQuestionPayloadSchema,
});

export type SurveyEntry = z.infer<typeof surveyEntrySchema>;
export type BlockDescriptor = z.infer<typeof blockSchema>;
export type EmbeddedField = z.infer<typeof embeddedFieldSchema>;
export type KeyedQuestionPayload = z.infer<typeof keyedQuestionPayloadSchema>;
export type FixedScaleQuestionPayload = z.infer<typeof fixedScaleQuestionPayloadSchema>;
export type DisplayChoice = z.infer<typeof displayChoiceSchema>;
