export type TextOfLawResponse = {
  text_of_law?: {
    title?: string;
    abbreviation?: string;
  };
};
