import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "../types";

export const schema = new Schema({
  route_id: { type: String, required: true, trim: true, unique: true },
  agency_id: { type: String, trim: true },
  route_short_name: { type: String, trim: true },
  route_long_name: { type: String, trim: true },
  route_type: { type: Number, min: 0 },
});

type GtfsRouteType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "gtfs_routes";
export default model(modelName, schema, modelName);
export type { GtfsRouteType };
export { modelName };
