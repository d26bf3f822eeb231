import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "../types";

export const schema = new Schema({
  trip_id: { type: String, required: true, trim: true, unique: true },
  route_id: { type: String, required: true, trim: true, index: true },
  service_id: { type: String, required: true, trim: true, index: true },
  trip_headsign: { type: String, trim: true },
  direction_id: { type: Number, enum: [0, 1] },
  block_id: { type: String, trim: true },
  shape_id: { type: String, trim: true },
});

type GtfsTripType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "gtfs_trips";
export default model(modelName, schema, modelName);
export type { GtfsTripType };
export { modelName };
