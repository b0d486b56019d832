import type { Language } from '../../types/config';
import type { VisionResult } from '../../types/image';

const SYSTEM_INSTRUCTIONS: Record<Language, string> = {
  fr: `Tu es un archiviste photo et un rédacteur expérimenté.
Tu décris des images pour une photothèque : titres courts et évocateurs, descriptions précises,
mots-clés utiles pour la recherche. Réponds toujours en français et uniquement avec un objet JSON valide.`,
  en: `You are an experienced photo archivist and copywriter.
You describe images for a photo library: short evocative titles, accurate descriptions,
keywords that help search. Always answer in English and only with a valid JSON object.`,
};

const COMMENT_INSTRUCTIONS: Record<Language, string> = {
  fr: 'Tu es un auteur qui commente des photographies. Réponds en français, en texte brut.',
  en: 'You are a writer commenting on photographs. Answer in English, in plain text.',
};

const FIELD_GUIDE: Record<Language, string> = {
  fr: `{
  "title": "Titre de 3 à 7 mots",
  "description": "Description détaillée et factuelle (2 à 4 phrases)",
  "comment": "Interprétation poétique, philosophique ou artistique (3 à 5 phrases)",
  "story": "Courte histoire de mise en ambiance inspirée de l'image",
  "main_genre": "Genre principal (paysage, portrait, architecture...)",
  "secondary_genre": "Sous-genre",
  "content_keywords": ["mots-clés décrivant le contenu"],
  "technical_characteristics": ["caractéristiques techniques : lumière, cadrage, couleurs"]
}`,
  en: `{
  "title": "Title of 3 to 7 words",
  "description": "Detailed, factual description (2 to 4 sentences)",
  "comment": "Poetic, philosophical or artistic interpretation (3 to 5 sentences)",
  "story": "Short mood-setting story inspired by the image",
  "main_genre": "Main genre (landscape, portrait, architecture...)",
  "secondary_genre": "Sub-genre",
  "content_keywords": ["keywords describing the content"],
  "technical_characteristics": ["technical traits: light, framing, colours"]
}`,
};

const CONTEXT_HEADINGS: Record<Language, Record<keyof VisionResult, string>> = {
  fr: {
    labels: 'Étiquettes détectées',
    objects: 'Objets localisés',
    landmarks: 'Lieux reconnus',
    webEntities: 'Entités web',
    colors: 'Couleurs dominantes',
  },
  en: {
    labels: 'Detected labels',
    objects: 'Localized objects',
    landmarks: 'Recognized landmarks',
    webEntities: 'Web entities',
    colors: 'Dominant colours',
  },
};

const CONTEXT_LIMIT = 15;

export function systemInstruction(language: Language): string {
  return SYSTEM_INSTRUCTIONS[language];
}

export function commentInstruction(language: Language): string {
  return COMMENT_INSTRUCTIONS[language];
}

/** Vision output rendered as bullet lines; empty categories are left out. */
export function visionContext(vision: VisionResult, language: Language): string {
  const headings = CONTEXT_HEADINGS[language];
  const sections: [string, string[]][] = [
    [headings.labels, vision.labels.map((label) => label.description)],
    [headings.objects, vision.objects.map((object) => object.name)],
    [headings.landmarks, vision.landmarks.map((landmark) => landmark.description)],
    [headings.webEntities, vision.webEntities],
    [headings.colors, vision.colors.map((color) => color.hex)],
  ];

  return sections
    .map(([heading, values]) => [heading, unique(values).slice(0, CONTEXT_LIMIT)] as const)
    .filter(([, values]) => values.length > 0)
    .map(([heading, values]) => `- ${heading}: ${values.join(', ')}`)
    .join('\n');
}

export function buildTaggingPrompt(vision: VisionResult, language: Language): string {
  const context = visionContext(vision, language);
  if (language === 'fr') {
    return [
      'Analyse cette image et retourne un objet JSON avec exactement ces clés :',
      FIELD_GUIDE.fr,
      context ? `Indices fournis par l'analyse automatique :\n${context}` : '',
      'Ne retourne rien d’autre que le JSON.',
    ]
      .filter(Boolean)
      .join('\n\n');
  }
  return [
    'Analyze this image and return a JSON object with exactly these keys:',
    FIELD_GUIDE.en,
    context ? `Hints from automatic analysis:\n${context}` : '',
    'Return nothing but the JSON.',
  ]
    .filter(Boolean)
    .join('\n\n');
}

/** Follow-up used when the first answer came back without a comment. */
export function buildCommentPrompt(title: string, language: Language): string {
  return language === 'fr'
    ? `Écris une interprétation poétique, philosophique ou artistique de cette image intitulée « ${title} », en 3 à 5 phrases. Réponds uniquement avec le texte.`
    : `Write a poetic, philosophical or artistic interpretation of this image titled "${title}", in 3 to 5 sentences. Answer with the text only.`;
}

function unique(values: string[]): string[] {
  return [...new Set(values.map((value) => value.trim()).filter(Boolean))];
}
