import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "../types";

export const schema = new Schema(
  {
    run_id: { type: String, required: true, index: true },
    service_date: { type: String, required: true, index: true },
    route_id: { type: String, required: true, index: true },
    stop_id: { type: String, required: true },
    trip_id: { type: String, required: true },
    previous_trip_id: { type: String, required: true },
    stop_sequence: { type: Number, required: true, min: 0 },
    scheduled_at: { type: Date, required: true },
    scheduled_headway_seconds: { type: Number, required: true, min: 0 },
    actual_headway_seconds: { type: Number, required: true },
    bunching: { type: Boolean, required: true },
  },
  {
    timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
  },
);

type HeadwayRecordType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "headway_records";
export default model(modelName, schema, modelName);
export type { HeadwayRecordType };
export { modelName };
