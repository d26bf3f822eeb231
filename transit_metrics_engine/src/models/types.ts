import type { Types } from "mongoose";

export type ObjectIdType = string | Types.ObjectId;
export type ObjectIdExtendType = { _id?: ObjectIdType };
