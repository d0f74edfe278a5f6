/**
 * Listing MongoDB Model
 * Mongoose schema for crawled job listings
 */

import mongoose, { Schema } from 'mongoose';
import { IListing } from './listing.types';

const ListingSchema = new Schema<IListing>(
  {
    fingerprint: {
      type: String,
      required: true,
      unique: true,
    },
    title: {
      type: String,
      required: true,
      trim: true,
    },
    link: {
      type: String,
      required: true,
    },
    company: {
      type: String,
      default: 'N/A',
    },
    location: {
      type: String,
      default: 'N/A',
    },
    postedDate: {
      type: String,
      default: 'N/A',
    },
    salary: String,
    logoUrl: String,
    skills: {
      type: [String],
      default: [],
    },
    sourceSite: {
      type: String,
      required: true,
    },
    fetchedAt: {
      type: Date,
      required: true,
    },
  },
  {
    timestamps: true,
    toJSON: {
      transform: (_doc, ret) => {
        const { _id, __v, ...rest } = ret;
        return { id: String(_id), ...rest };
      },
    },
  }
);

ListingSchema.index({ sourceSite: 1, createdAt: -1 });
ListingSchema.index({ link: 1 });

export const ListingModel = mongoose.model<IListing>('Listing', ListingSchema);
