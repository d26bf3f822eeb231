import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "../types";
import { isOptionalGtfsTime } from "./validators";

export const schema = new Schema({
  trip_id: { type: String, required: true, trim: true },
  stop_id: { type: String, required: true, trim: true, index: true },
  stop_sequence: { type: Number, required: true, min: 0 },
  arrival_time: {
    type: String,
    validate: {
      validator: isOptionalGtfsTime,
      message: "Invalid arrival_time, expected HH:MM:SS",
    },
  },
  departure_time: {
    type: String,
    validate: {
      validator: isOptionalGtfsTime,
      message: "Invalid departure_time, expected HH:MM:SS",
    },
  },
  timepoint: { type: Number, enum: [0, 1] },
});

schema.index({ trip_id: 1, stop_sequence: 1 }, { unique: true });

type GtfsStopTimeType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "gtfs_stop_times";
export default model(modelName, schema, modelName);
export type { GtfsStopTimeType };
export { modelName };
