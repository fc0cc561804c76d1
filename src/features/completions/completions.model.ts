import { Schema, model, Types } from 'mongoose'

export interface ICompletion {
  habitId: Types.ObjectId
  // calendar date, YYYY-MM-DD
  completedDate: string
  completedAt: Date
  notes?: string | null
  rating?: number | null
}

const completionSchema = new Schema<ICompletion>({
  habitId: { type: Schema.Types.ObjectId, ref: 'Habit', required: true, index: true },
  completedDate: { type: String, required: true, match: /^\d{4}-\d{2}-\d{2}$/ },
  completedAt: { type: Date, default: () => new Date() },
  notes: { type: String, default: null },
  rating: { type: Number, min: 1, max: 5, default: null },
})

completionSchema.index({ habitId: 1, completedDate: 1 }, { unique: true })

export const CompletionModel = model<ICompletion>('Completion', completionSchema)
