import { Schema, model, Types } from 'mongoose'
import { FREQUENCIES, Frequency } from '@/analytics/types'

export interface IHabit {
  ownerId: Types.ObjectId
  name: string
  description?: string | null
  frequency: Frequency
  createdAt: Date
  updatedAt?: Date
}

const habitSchema = new Schema<IHabit>({
  ownerId: { type: Schema.Types.ObjectId, ref: 'User', required: true, index: true },
  name: { type: String, required: true, trim: true, maxlength: 100 },
  description: { type: String, default: null },
  frequency: { type: String, enum: [...FREQUENCIES], default: 'daily' },
}, { timestamps: true })

habitSchema.index({ ownerId: 1, createdAt: 1 })

export const HabitModel = model<IHabit>('Habit', habitSchema)
