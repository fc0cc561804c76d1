import { Schema, model } from 'mongoose'

export interface IUser {
  username: string
  email: string
  createdAt: Date
  updatedAt: Date
}

const userSchema = new Schema<IUser>({
  username: {
    type: String,
    required: true,
    unique: true,
    trim: true,
    maxlength: 50,
  },
  email: {
    type: String,
    required: true,
    unique: true,
    trim: true,
    lowercase: true,
    maxlength: 100,
  },
}, {
  timestamps: true,
})

export const UserModel = model<IUser>('User', userSchema)
