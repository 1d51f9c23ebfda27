import { normalizeMarkdown } from "../text.js";

export function buildStarterTest(): string {
  return normalizeMarkdown(`def test_initial():
    assert True
`);
}

export function buildPytestIni(): string {
  return normalizeMarkdown(`[pytest]
python_files = tests.py test_*.py *_tests.py
testpaths = config/tests
`);
}

export function buildStarterScript(): string {
  return normalizeMarkdown(`import os

from dotenv import load_dotenv
from openai import OpenAI

load_dotenv("../config/.env")

client = OpenAI(api_key=os.getenv("OPENAI_API_KEY"))

messages = [
    {"role": "system", "content": "You are a helpful assistant."},
    {"role": "user", "content": "Translate the following English text to French: 'Hello, how are you?'"},
]

response = client.chat.completions.create(
    model="gpt-3.5-turbo",
    messages=messages,
    max_tokens=60,
)

print(response.choices[0].message.content)
`);
}
