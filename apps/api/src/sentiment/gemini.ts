import { GoogleGenAI, Type } from '@google/genai';
import { z } from 'zod';
import { RawSentiment, SentimentCapability } from './classifier';

const cleanJson = (text: string) => text.replace(/```json/g, '').replace(/```/g, '').trim();

const responseSchema = z.object({
  label: z.string(),
  confidence: z.number()
});

export const createGeminiSentiment = (apiKey: string, model: string): SentimentCapability => {
  const ai = new GoogleGenAI({ apiKey });

  const classify = async (text: string): Promise<RawSentiment> => {
    const prompt = `
You are a sentiment classifier for mobile banking app reviews.
Classify the review as POSITIVE or NEGATIVE and give the probability (0..1) of the label you chose.

Review:
${text.slice(0, 2000)}
`;

    const response = await ai.models.generateContent({
      model,
      contents: prompt,
      config: {
        temperature: 0,
        responseMimeType: 'application/json',
        responseSchema: {
          type: Type.OBJECT,
          properties: {
            label: { type: Type.STRING, enum: ['POSITIVE', 'NEGATIVE'] },
            confidence: { type: Type.NUMBER }
          },
          required: ['label', 'confidence']
        }
      }
    });

    const body = response.text || '';
    if (!body) throw new Error('Gemini returned empty content');
    return responseSchema.parse(JSON.parse(cleanJson(body)));
  };

  return { name: `gemini:${model}`, classify };
};
