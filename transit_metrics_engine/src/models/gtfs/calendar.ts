import { InferSchemaType, model, Schema } from "mongoose";
import type { ObjectIdExtendType } from "../types";
import { isGtfsDate } from "./validators";

const dayFlag = { type: Number, enum: [0, 1], required: true };
const gtfsDate = {
  type: String,
  required: true,
  validate: { validator: isGtfsDate, message: "Invalid date, expected YYYYMMDD" },
};

export const schema = new Schema({
  service_id: { type: String, required: true, trim: true, unique: true },
  monday: dayFlag,
  tuesday: dayFlag,
  wednesday: dayFlag,
  thursday: dayFlag,
  friday: dayFlag,
  saturday: dayFlag,
  sunday: dayFlag,
  start_date: gtfsDate,
  end_date: gtfsDate,
});

type GtfsCalendarType = InferSchemaType<typeof schema> & ObjectIdExtendType;

const modelName = "gtfs_calendar";
export default model(modelName, schema, modelName);
export type { GtfsCalendarType };
export { modelName };
