import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "../types";

const GROUP_KEY_PATTERN = /^(overall|hour:([01]\d|2[0-3])|dow:(sun|mon|tue|wed|thu|fri|sat))$/;

export const schema = new Schema(
  {
    run_id: { type: String, required: true, index: true },
    service_date: { type: String, required: true, index: true },
    route_id: { type: String, required: true },
    group_key: {
      type: String,
      required: true,
      validate: {
        validator: (value: unknown) =>
          typeof value === "string" && GROUP_KEY_PATTERN.test(value),
        message: "Invalid group_key",
      },
    },
    arrival_count: { type: Number, required: true, min: 0 },
    headway_count: { type: Number, required: true, min: 0 },
    // null marks a statistic with no input records, never zero
    otp_percent: { type: Number, min: 0, max: 100, default: null },
    avg_delay_seconds: { type: Number, default: null },
    delay_stddev_seconds: { type: Number, min: 0, default: null },
    bunching_rate: { type: Number, min: 0, max: 1, default: null },
    reliability_score: { type: Number, default: null },
  },
  {
    timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
  },
);

schema.index({ service_date: 1, route_id: 1, group_key: 1 }, { unique: true });

type AggregateMetricType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "aggregate_metrics";
export default model(modelName, schema, modelName);
export type { AggregateMetricType };
export { modelName };
