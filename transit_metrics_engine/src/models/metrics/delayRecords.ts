import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "../types";

export const schema = new Schema(
  {
    run_id: { type: String, required: true, index: true },
    service_date: { type: String, required: true, index: true },
    route_id: { type: String, required: true, index: true },
    stop_id: { type: String, required: true },
    trip_id: { type: String, required: true },
    stop_sequence: { type: Number, required: true, min: 0 },
    scheduled_at: { type: Date, required: true },
    inferred_at: { type: Date, required: true },
    delay_seconds: { type: Number, required: true },
    classification: {
      type: String,
      enum: ["early", "on_time", "late"],
      required: true,
    },
  },
  {
    timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
  },
);

type DelayRecordType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "delay_records";
export default model(modelName, schema, modelName);
export type { DelayRecordType };
export { modelName };
