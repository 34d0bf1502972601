/**
 * Serializes a report result as 2-space indented JSON with a trailing newline.
 * Key order follows the object's insertion order.
 */
export const formatJsonResult = (result: unknown): string => `${JSON.stringify(result, null, 2)}\n`

export const writeJsonResult = (
  result: unknown,
  stream: NodeJS.WritableStream = process.stdout
): Promise<void> =>
  new Promise((resolve, reject) => {
    stream.write(formatJsonResult(result), (error?: Error | null) => {
      if (error) {
        reject(error)
        return
      }
      resolve()
    })
  })
