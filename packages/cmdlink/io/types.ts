import type { Result } from "@cmdlink/core"
import type { IoError } from "@/types/errors"

export type { IoError } from "@/types/errors"

export type IoResult<T> = Result<T, IoError>
