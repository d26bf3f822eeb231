import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "../types";
import { isGtfsDate } from "./validators";

export const schema = new Schema({
  service_id: { type: String, required: true, trim: true, index: true },
  date: {
    type: String,
    required: true,
    index: true,
    validate: { validator: isGtfsDate, message: "Invalid date, expected YYYYMMDD" },
  },
  // 1 = service added, 2 = service removed
  exception_type: { type: Number, enum: [1, 2], required: true },
});

type GtfsCalendarDateType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "gtfs_calendar_dates";
export default model(modelName, schema, modelName);
export type { GtfsCalendarDateType };
export { modelName };
