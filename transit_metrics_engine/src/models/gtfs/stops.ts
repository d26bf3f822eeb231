import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "../types";

export const schema = new Schema({
  stop_id: { type: String, required: true, trim: true, unique: true },
  stop_name: { type: String, trim: true },
  // stations and entrances may leave coordinates blank
  stop_lat: { type: Number, min: -90, max: 90 },
  stop_lon: { type: Number, min: -180, max: 180 },
  location_type: { type: Number, enum: [0, 1, 2, 3, 4], default: 0 },
  parent_station: { type: String, trim: true },
});

type GtfsStopType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "gtfs_stops";
export default model(modelName, schema, modelName);
export type { GtfsStopType };
export { modelName };
