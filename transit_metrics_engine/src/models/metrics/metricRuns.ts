import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "../types";

export const schema = new Schema(
  {
    run_id: { type: String, required: true, unique: true },
    service_date: { type: String, required: true, index: true },
    range_start: { type: Date, required: true },
    range_end: { type: Date, required: true },
    config: { type: Object, required: true },
    diagnostics: { type: Object, required: true },
    delay_record_count: { type: Number, required: true, min: 0 },
    headway_record_count: { type: Number, required: true, min: 0 },
    aggregate_count: { type: Number, required: true, min: 0 },
  },
  {
    timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
  },
);

type MetricRunType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "metric_runs";
export default model(modelName, schema, modelName);
export type { MetricRunType };
export { modelName };
