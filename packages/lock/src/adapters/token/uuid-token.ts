import { v4 as uuidv4 } from "uuid"
import type { TokenGenerator } from "../../ports/token-generator"

/** Random v4 UUID per acquisition. */
export const uuidToken: TokenGenerator = () => uuidv4()
